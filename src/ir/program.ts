import { AsyncLocalStorage } from 'node:async_hooks';
import type { Ir } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ir.program');

/**
 * 程序注册表的只读视图：把条目 id 映射回声明名。
 */
export interface Program {
  nameOf(id: Ir.ItemId): string | undefined;
}

/**
 * 内存中的程序注册表，按声明顺序分配条目下标。
 */
export class ProgramRegistry implements Program {
  private readonly kinds = new Map<number, Ir.TypeKind>();
  private readonly byName = new Map<string, Ir.ItemId>();

  static fromDeclarations(declarations: readonly Ir.TypeKind[]): ProgramRegistry {
    const registry = new ProgramRegistry();
    for (const decl of declarations) registry.declare(decl);
    return registry;
  }

  declare(decl: Ir.TypeKind): Ir.ItemId {
    const id: Ir.ItemId = { kind: 'ItemId', index: this.kinds.size };
    this.kinds.set(id.index, decl);
    // 重名时保留最早的声明
    if (!this.byName.has(decl.name)) this.byName.set(decl.name, id);
    return id;
  }

  get size(): number {
    return this.kinds.size;
  }

  typeKind(id: Ir.ItemId): Ir.TypeKind | undefined {
    return this.kinds.get(id.index);
  }

  itemId(name: string): Ir.ItemId | undefined {
    return this.byName.get(name);
  }

  nameOf(id: Ir.ItemId): string | undefined {
    return this.typeKind(id)?.name;
  }
}

// 每个异步任务各自的当前程序槽位；嵌套安装时最内层生效
const currentProgram = new AsyncLocalStorage<Program | undefined>();

/**
 * 在 `f` 的动态范围内（含其中启动的异步延续）安装 `program`。
 * 无论 `f` 正常返回还是抛出，退出后都恢复到外层绑定。
 */
export function withProgram<R>(program: Program | undefined, f: () => R): R {
  const outer = currentProgram.getStore();
  logger.debug('program installed', { empty: program === undefined, shadowing: outer !== undefined });
  try {
    return currentProgram.run(program, f);
  } finally {
    logger.debug('program binding restored', { empty: outer === undefined });
  }
}

/**
 * 以当前安装的程序（若没有则为 undefined）调用 `f` 并返回其结果。
 */
export function withCurrentProgram<R>(f: (program: Program | undefined) => R): R {
  return f(currentProgram.getStore());
}
