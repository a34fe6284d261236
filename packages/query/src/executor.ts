// packages/query/src/executor.ts
import { childLogger, UnknownKindError } from '@recset/core';
import type { DataRecord, PlanSnapshot, PlanStep, RecordSet, ScopeContext } from '@recset/core';
import type { RecordStore } from '@recset/store';
import type { AssociationRegistry } from '@recset/associations';
import { whereScope, orderScope, type ScopeEngine } from '@recset/scopes';
import { QueryPlan, isPlanSnapshot } from './plan';

const log = childLogger('query');

const identity = (r: DataRecord) => `${r.kind}#${r.id}`;

/**
 * Evaluates plan steps against the store. Sets flow through each step in
 * order; nothing is cached between runs.
 */
export class QueryExecutor {
  constructor(
    readonly store: RecordStore,
    readonly associations: AssociationRegistry,
    readonly scopes: ScopeEngine
  ) {}

  query(kind: string): QueryPlan {
    if (!this.store.hasKind(kind)) throw new UnknownKindError(kind);
    return new QueryPlan(this, kind);
  }

  /** flatten each source through `association`: source order, then target order, repeats kept */
  joins(set: RecordSet, association: string): DataRecord[] {
    const out: DataRecord[] = [];
    for (const rec of set) {
      const targets = this.associations.resolve(rec, association);
      if (Array.isArray(targets)) out.push(...targets);
      else if (targets) out.push(targets);
    }
    return out;
  }

  /**
   * records of `set` whose identity appears in `other`, in `set` order.
   * A plan operand is run from its steps and stays usable.
   */
  merge(set: RecordSet, other: PlanSnapshot | RecordSet): DataRecord[] {
    const rows = isPlanSnapshot(other) ? this.run(other.baseKind, other.steps) : other;
    const keep = new Set(rows.map(identity));
    return set.filter((r) => keep.has(identity(r)));
  }

  run(baseKind: string, steps: readonly PlanStep[]): DataRecord[] {
    const t0 = Date.now();
    let set: DataRecord[] = this.store.all(baseKind);

    for (const step of steps) {
      switch (step.op) {
        case 'scope':
          set = this.scopes.apply(set, step.kind, step.name, step.args, this.context(step.kind));
          break;
        case 'where':
          set = whereScope(set, step.attribute, step.condition);
          break;
        case 'order':
          set = orderScope(set, step.column, step.direction);
          break;
        case 'join':
          set = this.joins(set, step.association);
          break;
        case 'merge':
          set = this.merge(set, step.other);
          break;
        case 'offset':
          set = set.slice(step.count);
          break;
        case 'limit':
          set = set.slice(0, step.count);
          break;
      }
    }

    log.debug({ kind: baseKind, steps: steps.map((s) => s.op), rowCount: set.length, ms: Date.now() - t0 }, 'materialize');
    return set;
  }

  private context(kind: string): ScopeContext {
    return {
      kind,
      query: (k) => this.query(k),
      merge: (set, other) => this.merge(set, other),
      attributeType: (attribute) => this.store.attributeType(kind, attribute)
    };
  }
}
