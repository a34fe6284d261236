// --------------------
// Attributes & kinds
// --------------------
export type AttributeType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean';

export type AttributeValue = string | number | boolean | null;

export interface AttributeDef {
  type: AttributeType;
  required?: boolean;
  default?: AttributeValue;
}

// shorthand: `{ name: 'string' }` == `{ name: { type: 'string' } }`
export type AttributeSchema = Record<string, AttributeType | AttributeDef>;

export interface EntityKind {
  name: string;
  attributes: Record<string, AttributeDef>;
}

export type Attributes = Record<string, AttributeValue>;

export interface DataRecord {
  readonly kind: string;
  readonly id: number;
  readonly attributes: Readonly<Attributes>;
}

export type RecordSet = readonly DataRecord[];

// --------------------
// Associations
// --------------------
export type AssociationSpec =
  | { type: 'one-to-one'; target: string; foreignKey: string }
  | { type: 'one-to-many'; target: string; foreignKey: string }
  | {
      type: 'many-to-many-through';
      target: string;
      through: string;   // join kind
      sourceKey: string; // join.sourceKey -> source.id
      targetKey: string; // join.targetKey -> target.id
      dedupe?: boolean;  // skip append when the pair already exists
    };

export type AssociationDefinition = AssociationSpec & { source: string; name: string };

// --------------------
// Conditions
// --------------------
export interface Range {
  from?: string | number;
  to?: string | number;
}

// value -> equality, array -> membership, range -> inclusive bounds
export type Condition = AttributeValue | readonly AttributeValue[] | Range;

export type SortDirection = 'asc' | 'desc';

// --------------------
// Query chain (implemented by @recset/query)
// --------------------
export type ScopeArg = Condition | SortDirection;

export type PlanStep =
  | { op: 'scope'; kind: string; name: string; args: readonly ScopeArg[] }
  | { op: 'where'; kind: string; attribute: string; condition: Condition }
  | { op: 'order'; kind: string; column: string; direction: SortDirection }
  | { op: 'join'; kind: string; association: string; target: string }
  | { op: 'merge'; kind: string; other: PlanSnapshot | RecordSet }
  | { op: 'limit'; kind: string; count: number }
  | { op: 'offset'; kind: string; count: number };

/** the immutable part of a plan; enough to run it again */
export interface PlanSnapshot {
  readonly baseKind: string;
  readonly kind: string;
  readonly steps: readonly PlanStep[];
}

export interface QueryChain extends PlanSnapshot {
  readonly materialized: boolean;
  scope(name: string, ...args: ScopeArg[]): QueryChain;
  where(attribute: string, condition: Condition): QueryChain;
  order(column: string, direction?: SortDirection): QueryChain;
  join(association: string): QueryChain;
  merge(other: QueryChain | RecordSet): QueryChain;
  limit(count: number): QueryChain;
  offset(count: number): QueryChain;
  toSequence(): DataRecord[];
  count(): number;
  average(attribute: string): number;
  first(): DataRecord;
  pluck(attribute: string): AttributeValue[];
  explain(): string[];
}

// --------------------
// Scopes
// --------------------
export interface ScopeContext {
  kind: string;
  query(kind: string): QueryChain;
  merge(set: RecordSet, other: PlanSnapshot | RecordSet): DataRecord[];
  /** declared type of `attribute` on this kind, undefined when it has none */
  attributeType(attribute: string): AttributeType | undefined;
}

export type ScopeFn = (set: RecordSet, args: readonly ScopeArg[], ctx: ScopeContext) => RecordSet;
