/**
 * @module logic-ir-debug
 *
 * 把 trait 求解器使用的逻辑 IR（类型、生命周期、trait 引用、where 子句与证明目标）
 * 渲染为确定性的可读文本，供诊断、日志与测试断言使用。
 *
 * @example 基础用法
 * ```typescript
 * import { Ir, ProgramRegistry, formatDebug, withProgram } from 'logic-ir-debug';
 *
 * const program = ProgramRegistry.fromDeclarations([
 *   { sort: 'Struct', name: 'Vec', parameters: [{ kind: 'Ty', value: 'T' }] },
 * ]);
 * const vec = Ir.Apply(Ir.ItemId(0), [Ir.TyParam(Ir.Var(0))]);
 * withProgram(program, () => formatDebug(vec)); // 'Vec<?0>'
 * ```
 */

export * from './ir/index.js';
export type { Ir as IrTypes, QuantifierKind, TypeSort } from './types.js';
export { ContractCode, ContractViolation } from './diagnostics/contract.js';
export { ConfigService, type BinderLabelStyle } from './config/config-service.js';
export { Logger, LogLevel, createLogger, type LogMetadata, type LogWriter } from './utils/logger.js';
