// Constructors for logic IR terms

import type { Ir as IrTypes, QuantifierKind } from '../types.js';

const universe = (counter: number): IrTypes.UniverseIndex => ({ kind: 'Universe', counter });

export const Ir = {
  // Names
  ItemId: (index: number): IrTypes.ItemId => ({ kind: 'ItemId', index }),
  Universe: universe,
  ForAllName: (counter: number): IrTypes.ForAllName => ({
    kind: 'ForAllName',
    universe: universe(counter),
  }),
  AssociatedType: (traitId: IrTypes.ItemId, name: string): IrTypes.AssociatedType => ({
    kind: 'AssociatedType',
    traitId,
    name,
  }),

  // Parameters
  TyParam: (value: IrTypes.Ty): IrTypes.Parameter => ({ kind: 'Ty', value }),
  LifetimeParam: (value: IrTypes.Lifetime): IrTypes.Parameter => ({ kind: 'Lifetime', value }),
  TyBinder: (): IrTypes.BinderKind => ({ kind: 'Ty', value: null }),
  LifetimeBinder: (): IrTypes.BinderKind => ({ kind: 'Lifetime', value: null }),

  // Types
  Var: (depth: number): IrTypes.TyVar => ({ kind: 'TyVar', depth }),
  Apply: (name: IrTypes.TypeName, parameters: readonly IrTypes.Parameter[] = []): IrTypes.ApplicationTy => ({
    kind: 'Apply',
    name,
    parameters,
  }),
  Projection: (traitRef: IrTypes.TraitRef, name: string): IrTypes.ProjectionTy => ({
    kind: 'Projection',
    traitRef,
    name,
  }),
  ForAllTy: (numBinders: number, ty: IrTypes.Ty): IrTypes.QuantifiedTy => ({
    kind: 'ForAllTy',
    numBinders,
    ty,
  }),

  // Lifetimes
  LifetimeVar: (depth: number): IrTypes.LifetimeVar => ({ kind: 'LifetimeVar', depth }),
  LifetimeForAll: (counter: number): IrTypes.LifetimeForAll => ({
    kind: 'LifetimeForAll',
    universe: universe(counter),
  }),

  // Traits and clauses
  TraitRef: (traitId: IrTypes.ItemId, parameters: readonly IrTypes.Parameter[]): IrTypes.TraitRef => ({
    kind: 'TraitRef',
    traitId,
    parameters,
  }),
  Normalize: (projection: IrTypes.ProjectionTy, ty: IrTypes.Ty): IrTypes.Normalize => ({
    kind: 'Normalize',
    projection,
    ty,
  }),
  Implemented: (traitRef: IrTypes.TraitRef): IrTypes.Implemented => ({ kind: 'Implemented', traitRef }),
  Unify: <T>(a: T, b: T): IrTypes.Unify<T> => ({ kind: 'Unify', a, b }),
  UnifyTys: (a: IrTypes.Ty, b: IrTypes.Ty): IrTypes.UnifyTys => ({
    kind: 'UnifyTys',
    unify: { kind: 'Unify', a, b },
  }),

  // Goals
  Quantified: (
    quantifier: QuantifierKind,
    binder: IrTypes.BinderKind,
    goal: IrTypes.Goal
  ): IrTypes.QuantifiedGoal => ({ kind: 'Quantified', quantifier, binder, goal }),
  Implies: (clause: IrTypes.WhereClause, goal: IrTypes.Goal): IrTypes.ImpliesGoal => ({
    kind: 'Implies',
    clause,
    goal,
  }),
  And: (left: IrTypes.Goal, right: IrTypes.Goal): IrTypes.AndGoal => ({ kind: 'And', left, right }),
  Leaf: (clause: IrTypes.WhereClauseGoal): IrTypes.LeafGoal => ({ kind: 'Leaf', clause }),
};
