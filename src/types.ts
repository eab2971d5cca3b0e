// Logic IR consumed by the debug printer.
//
// Terms are immutable trees built by the solver. Bound variables are De Bruijn
// indices (innermost binder = 0); rigid variables are identified by universe.

export type QuantifierKind = 'ForAll' | 'Exists';

export type TypeSort = 'Struct' | 'Trait';

export namespace Ir {
  export interface ItemId {
    readonly kind: 'ItemId';
    readonly index: number;
  }

  export interface UniverseIndex {
    readonly kind: 'Universe';
    readonly counter: number;
  }

  /** Rigid (skolemized) type variable living in `universe`. */
  export interface ForAllName {
    readonly kind: 'ForAllName';
    readonly universe: UniverseIndex;
  }

  export interface AssociatedType {
    readonly kind: 'AssociatedType';
    readonly traitId: ItemId;
    readonly name: string;
  }

  export type TypeName = ItemId | ForAllName | AssociatedType;

  /**
   * Tags a slot as type-valued or lifetime-valued. Generic argument lists use
   * `ParameterKind<Ty, Lifetime>`; binder tags use `ParameterKind<null, null>`.
   */
  export type ParameterKind<T, L> =
    | { readonly kind: 'Ty'; readonly value: T }
    | { readonly kind: 'Lifetime'; readonly value: L };

  export type Parameter = ParameterKind<Ty, Lifetime>;

  export type BinderKind = ParameterKind<null, null>;

  export interface TyVar {
    readonly kind: 'TyVar';
    readonly depth: number;
  }

  export interface ApplicationTy {
    readonly kind: 'Apply';
    readonly name: TypeName;
    readonly parameters: readonly Parameter[];
  }

  export interface ProjectionTy {
    readonly kind: 'Projection';
    readonly traitRef: TraitRef;
    readonly name: string;
  }

  /** Higher-ranked type binding `numBinders` fresh type variables over `ty`. */
  export interface QuantifiedTy {
    readonly kind: 'ForAllTy';
    readonly numBinders: number;
    readonly ty: Ty;
  }

  export type Ty = TyVar | ApplicationTy | ProjectionTy | QuantifiedTy;

  export interface LifetimeVar {
    readonly kind: 'LifetimeVar';
    readonly depth: number;
  }

  export interface LifetimeForAll {
    readonly kind: 'LifetimeForAll';
    readonly universe: UniverseIndex;
  }

  export type Lifetime = LifetimeVar | LifetimeForAll;

  /** `parameters[0]` is the Self type; the rest are the trait's own arguments. */
  export interface TraitRef {
    readonly kind: 'TraitRef';
    readonly traitId: ItemId;
    readonly parameters: readonly Parameter[];
  }

  export interface Normalize {
    readonly kind: 'Normalize';
    readonly projection: ProjectionTy;
    readonly ty: Ty;
  }

  export interface Implemented {
    readonly kind: 'Implemented';
    readonly traitRef: TraitRef;
  }

  export type WhereClause = Normalize | Implemented;

  export interface Unify<T> {
    readonly kind: 'Unify';
    readonly a: T;
    readonly b: T;
  }

  export interface UnifyTys {
    readonly kind: 'UnifyTys';
    readonly unify: Unify<Ty>;
  }

  export type WhereClauseGoal = WhereClause | UnifyTys;

  export interface QuantifiedGoal {
    readonly kind: 'Quantified';
    readonly quantifier: QuantifierKind;
    readonly binder: BinderKind;
    readonly goal: Goal;
  }

  export interface ImpliesGoal {
    readonly kind: 'Implies';
    readonly clause: WhereClause;
    readonly goal: Goal;
  }

  export interface AndGoal {
    readonly kind: 'And';
    readonly left: Goal;
    readonly right: Goal;
  }

  export interface LeafGoal {
    readonly kind: 'Leaf';
    readonly clause: WhereClauseGoal;
  }

  export type Goal = QuantifiedGoal | ImpliesGoal | AndGoal | LeafGoal;

  /** Every IR shape the printer can render on its own. */
  export type Term =
    | UniverseIndex
    | TypeName
    | Parameter
    | Ty
    | Lifetime
    | TraitRef
    | WhereClauseGoal
    | Unify<Term>
    | Goal;

  /** Declaration record a program keeps per item. */
  export interface TypeKind {
    readonly sort: TypeSort;
    readonly name: string;
    readonly parameters: readonly ParameterKind<string, string>[];
  }
}
