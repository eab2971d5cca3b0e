import type { Ir } from '../types.js';
import { ConfigService, type BinderLabelStyle } from '../config/config-service.js';
import { ContractCode, ContractViolation } from '../diagnostics/contract.js';
import { createLogger } from '../utils/logger.js';
import { writeAngle } from './angle.js';
import { withCurrentProgram } from './program.js';
import { StringSink, type TextSink } from './sink.js';

const logger = createLogger('ir.debug');

export interface PrinterOptions {
  /** Defaults to the configured `LOGIC_IR_BINDER_LABELS` style. */
  readonly binderLabels?: BinderLabelStyle;
}

/**
 * Renders logic IR terms as canonical text, writing straight into a sink.
 *
 * Output depends only on the term and the program installed via `withProgram`.
 * Errors thrown by the sink propagate unchanged.
 */
export class DebugPrinter {
  private readonly binderLabels: BinderLabelStyle;

  constructor(private readonly sink: TextSink, options: PrinterOptions = {}) {
    this.binderLabels = options.binderLabels ?? ConfigService.getInstance().binderLabels;
  }

  term(t: Ir.Term): void {
    switch (t.kind) {
      case 'Universe':
        return this.universe(t);
      case 'ItemId':
      case 'ForAllName':
      case 'AssociatedType':
        return this.typeName(t);
      case 'Ty':
      case 'Lifetime':
        return this.parameter(t);
      case 'TyVar':
      case 'Apply':
      case 'Projection':
      case 'ForAllTy':
        return this.ty(t);
      case 'LifetimeVar':
      case 'LifetimeForAll':
        return this.lifetime(t);
      case 'TraitRef':
        return this.traitRef(t);
      case 'Normalize':
      case 'Implemented':
      case 'UnifyTys':
        return this.whereClauseGoal(t);
      case 'Unify':
        return this.unify(t, side => this.term(side));
      case 'Quantified':
      case 'Implies':
      case 'And':
      case 'Leaf':
        return this.goal(t);
    }
  }

  universe(u: Ir.UniverseIndex): void {
    this.sink.write(`U${u.counter}`);
  }

  itemId(id: Ir.ItemId): void {
    const name = withCurrentProgram(program => program?.nameOf(id));
    if (name !== undefined) {
      this.sink.write(name);
      return;
    }
    logger.debug('item id has no declared name', { index: id.index });
    this.sink.write(`ItemId { index: ${id.index} }`);
  }

  typeName(n: Ir.TypeName): void {
    switch (n.kind) {
      case 'ItemId':
        return this.itemId(n);
      case 'ForAllName':
        return this.sink.write(`!${n.universe.counter}`);
      case 'AssociatedType':
        this.sink.write('(');
        this.itemId(n.traitId);
        this.sink.write(`::${n.name})`);
        return;
    }
  }

  parameter(p: Ir.Parameter): void {
    if (p.kind === 'Ty') this.ty(p.value);
    else this.lifetime(p.value);
  }

  ty(t: Ir.Ty): void {
    switch (t.kind) {
      case 'TyVar':
        return this.sink.write(`?${t.depth}`);
      case 'Apply':
        this.typeName(t.name);
        return this.parameters(t.parameters);
      case 'Projection':
        this.sink.write('<');
        this.traitRef(t.traitRef);
        this.sink.write(`>::${t.name}`);
        return;
      case 'ForAllTy':
        // TODO: name the bound variables instead of printing only their count
        this.sink.write(`for<${t.numBinders}> `);
        return this.ty(t.ty);
    }
  }

  lifetime(l: Ir.Lifetime): void {
    switch (l.kind) {
      case 'LifetimeVar':
        return this.sink.write(`'?${l.depth}`);
      case 'LifetimeForAll':
        return this.sink.write(`'!${l.universe.counter}`);
    }
  }

  traitRef(tr: Ir.TraitRef): void {
    const [self, rest] = splitSelf(tr);
    this.parameter(self);
    this.sink.write(' as ');
    this.itemId(tr.traitId);
    this.parameters(rest);
  }

  /** `Self as Trait<Args, Name = Ty>`, the associated-type binding form. */
  normalize(n: Ir.Normalize): void {
    const { traitRef, name } = n.projection;
    const [self, rest] = splitSelf(traitRef);
    const args: Array<() => void> = rest.map(p => () => this.parameter(p));
    args.push(() => {
      this.sink.write(`${name} = `);
      this.ty(n.ty);
    });
    this.parameter(self);
    this.sink.write(' as ');
    this.itemId(traitRef.traitId);
    writeAngle(this.sink, args, writeArg => writeArg());
  }

  whereClause(wc: Ir.WhereClause): void {
    switch (wc.kind) {
      case 'Normalize':
        return this.normalize(wc);
      case 'Implemented':
        return this.traitRef(wc.traitRef);
    }
  }

  whereClauseGoal(wc: Ir.WhereClauseGoal): void {
    if (wc.kind === 'UnifyTys') this.unify(wc.unify, side => this.ty(side));
    else this.whereClause(wc);
  }

  unify<T>(u: Ir.Unify<T>, writeSide: (side: T) => void): void {
    this.sink.write('(');
    writeSide(u.a);
    this.sink.write(' = ');
    writeSide(u.b);
    this.sink.write(')');
  }

  goal(g: Ir.Goal): void {
    switch (g.kind) {
      case 'Quantified':
        this.sink.write(`${g.quantifier}<${this.binderLabel(g.binder)}> { `);
        this.goal(g.goal);
        this.sink.write(' }');
        return;
      case 'Implies':
        this.sink.write('if (');
        this.whereClause(g.clause);
        this.sink.write(') { ');
        this.goal(g.goal);
        this.sink.write(' }');
        return;
      case 'And':
        this.sink.write('(');
        this.goal(g.left);
        this.sink.write(', ');
        this.goal(g.right);
        this.sink.write(')');
        return;
      case 'Leaf':
        return this.whereClauseGoal(g.clause);
    }
  }

  private binderLabel(binder: Ir.BinderKind): string {
    if (binder.kind === 'Ty' || this.binderLabels === 'legacy') return 'type';
    return 'lifetime';
  }

  private parameters(params: readonly Ir.Parameter[]): void {
    writeAngle(this.sink, params, p => this.parameter(p));
  }
}

function splitSelf(tr: Ir.TraitRef): [Ir.Parameter, readonly Ir.Parameter[]] {
  const [self, ...rest] = tr.parameters;
  if (self === undefined) {
    const violation = new ContractViolation(
      ContractCode.C001_EmptyTraitParameters,
      `trait reference to item ${tr.traitId.index} has no Self parameter`
    );
    logger.error('malformed trait reference', violation, { traitIndex: tr.traitId.index });
    throw violation;
  }
  return [self, rest];
}

export function writeDebug(sink: TextSink, term: Ir.Term, options?: PrinterOptions): void {
  new DebugPrinter(sink, options).term(term);
}

export function formatDebug(term: Ir.Term, options?: PrinterOptions): string {
  const sink = new StringSink();
  writeDebug(sink, term, options);
  return sink.toString();
}
