/**
 * @module ir
 *
 * 逻辑 IR 调试打印模块。
 *
 * 包含：
 * - IR 构造器 (Ir)
 * - 程序注册表与作用域绑定 (ProgramRegistry, withProgram, withCurrentProgram)
 * - 尖括号参数列表 (writeAngle)
 * - 项/子句/目标打印器 (DebugPrinter, formatDebug, writeDebug)
 */

export { Ir } from './ir.js';
export { ProgramRegistry, withProgram, withCurrentProgram } from './program.js';
export type { Program } from './program.js';
export { writeAngle } from './angle.js';
export { StringSink } from './sink.js';
export type { TextSink } from './sink.js';
export { DebugPrinter, formatDebug, writeDebug } from './debug.js';
export type { PrinterOptions } from './debug.js';
