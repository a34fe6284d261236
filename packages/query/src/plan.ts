// packages/query/src/plan.ts
import {
  ConditionSchema, parseOrThrow,
  EmptySetError, MaterializedPlanError, UnknownScopeError, ValidationError
} from '@recset/core';
import type {
  AttributeValue, Condition, DataRecord, PlanSnapshot, PlanStep, QueryChain, RecordSet, ScopeArg, SortDirection
} from '@recset/core';
import { checkCondition, isRange, readAttribute } from '@recset/scopes';
import type { QueryExecutor } from './executor';

export function isPlanSnapshot(x: PlanSnapshot | RecordSet): x is PlanSnapshot {
  return !Array.isArray(x);
}

/**
 * Immutable, lazily evaluated query over one base kind. Every chained call
 * returns a new plan; terminals (`toSequence`, `count`, `average`, `first`,
 * `pluck`) evaluate it once, after which the plan is spent.
 */
export class QueryPlan implements QueryChain {
  private spent = false;

  constructor(
    private readonly executor: QueryExecutor,
    readonly baseKind: string,
    readonly kind: string = baseKind,
    readonly steps: readonly PlanStep[] = []
  ) {}

  get materialized(): boolean {
    return this.spent;
  }

  scope(name: string, ...args: ScopeArg[]): QueryPlan {
    this.assertBuilt();
    if (!this.executor.scopes.has(this.kind, name)) throw new UnknownScopeError(this.kind, name);
    return this.with({ op: 'scope', kind: this.kind, name, args });
  }

  where(attribute: string, condition: Condition): QueryPlan {
    this.assertBuilt();
    this.assertAttribute(attribute);
    const parsed = parseOrThrow(ConditionSchema, condition, `Invalid condition for ${this.kind}.${attribute}`);
    const type = this.executor.store.attributeType(this.kind, attribute);
    return this.with({
      op: 'where', kind: this.kind, attribute, condition: checkCondition(this.kind, attribute, type, parsed)
    });
  }

  order(column: string, direction: SortDirection = 'asc'): QueryPlan {
    this.assertBuilt();
    this.assertAttribute(column);
    return this.with({ op: 'order', kind: this.kind, column, direction });
  }

  /** continue from the association's targets; the plan's kind becomes the target kind */
  join(association: string): QueryPlan {
    this.assertBuilt();
    const def = this.executor.associations.get(this.kind, association);
    return this.with({ op: 'join', kind: this.kind, association, target: def.target }, def.target);
  }

  /** keeps rows also present in `other`; a plan operand is captured by its steps, records by copy */
  merge(other: QueryChain | RecordSet): QueryPlan {
    this.assertBuilt();
    const operand: PlanSnapshot | RecordSet = isPlanSnapshot(other)
      ? { baseKind: other.baseKind, kind: other.kind, steps: other.steps }
      : [...other];
    return this.with({ op: 'merge', kind: this.kind, other: operand });
  }

  limit(count: number): QueryPlan {
    this.assertBuilt();
    return this.with({ op: 'limit', kind: this.kind, count: this.checkCount('limit', count) });
  }

  offset(count: number): QueryPlan {
    this.assertBuilt();
    return this.with({ op: 'offset', kind: this.kind, count: this.checkCount('offset', count) });
  }

  toSequence(): DataRecord[] {
    return this.materialize();
  }

  count(): number {
    return this.materialize().length;
  }

  /** mean of the non-null values; 0 for an empty set */
  average(attribute: string): number {
    this.assertAttribute(attribute);
    const values = this.materialize()
      .map((r) => readAttribute(r, attribute))
      .filter((v): v is Exclude<AttributeValue, null> => v !== null);
    if (!values.length) return 0;
    let sum = 0;
    for (const v of values) {
      if (typeof v !== 'number') {
        throw new ValidationError(`Cannot average ${this.kind}.${attribute}: ${typeof v} values`);
      }
      sum += v;
    }
    return sum / values.length;
  }

  first(): DataRecord {
    const [head] = this.materialize();
    if (!head) throw new EmptySetError(this.kind);
    return head;
  }

  pluck(attribute: string): AttributeValue[] {
    this.assertAttribute(attribute);
    return this.materialize().map((r) => readAttribute(r, attribute));
  }

  explain(): string[] {
    return explainSteps(this.baseKind, this.steps);
  }

  private with(step: PlanStep, kind = this.kind): QueryPlan {
    return new QueryPlan(this.executor, this.baseKind, kind, [...this.steps, step]);
  }

  private materialize(): DataRecord[] {
    this.assertBuilt();
    this.spent = true;
    return this.executor.run(this.baseKind, this.steps);
  }

  private assertBuilt(): void {
    if (this.spent) throw new MaterializedPlanError(this.kind);
  }

  private assertAttribute(attribute: string): void {
    if (!this.executor.store.hasAttribute(this.kind, attribute)) {
      throw new ValidationError(`Unknown attribute ${this.kind}.${attribute}`);
    }
  }

  private checkCount(what: string, n: number): number {
    if (!Number.isInteger(n) || n < 0) throw new ValidationError(`${what} must be a non-negative integer, got ${n}`);
    return n;
  }
}

function show(c: Condition | ScopeArg): string {
  if (Array.isArray(c)) return `[${c.map((v) => JSON.stringify(v)).join(', ')}]`;
  if (c !== null && typeof c === 'object' && isRange(c)) {
    return `${c.from ?? '-inf'}..${c.to ?? '+inf'}`;
  }
  return JSON.stringify(c);
}

function explainSteps(baseKind: string, steps: readonly PlanStep[]): string[] {
  return [`from ${baseKind}`, ...steps.map(describe)];
}

function describe(step: PlanStep): string {
  switch (step.op) {
    case 'scope': return `scope ${step.kind}.${step.name}(${step.args.map(show).join(', ')})`;
    case 'where': return `where ${step.kind}.${step.attribute} ${show(step.condition)}`;
    case 'order': return `order ${step.kind}.${step.column} ${step.direction}`;
    case 'join': return `join ${step.kind}.${step.association} -> ${step.target}`;
    case 'merge': {
      const other = step.other;
      return isPlanSnapshot(other)
        ? `merge (${explainSteps(other.baseKind, other.steps).join(' | ')})`
        : `merge ${other.length} records`;
    }
    case 'limit': return `limit ${step.count}`;
    case 'offset': return `offset ${step.count}`;
  }
}
