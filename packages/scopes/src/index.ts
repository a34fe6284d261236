// packages/scopes/src/index.ts
import { childLogger, DuplicateScopeError, UnknownScopeError, ValidationError, ConditionSchema, parseOrThrow } from '@recset/core';
import type { DataRecord, RecordSet, ScopeArg, ScopeContext, ScopeFn, SortDirection } from '@recset/core';
import { checkCondition, orderScope, whereScope } from './builtins';

export {
  range, isRange, matches, compareValues, readAttribute, orderScope, whereScope, checkCondition, conditionIssues
} from './builtins';

const log = childLogger('scopes');

const BUILTINS = new Map<string, ScopeFn>([
  ['where', (set, args, ctx) => {
    const [attribute, condition] = args;
    if (typeof attribute !== 'string') throw new ValidationError('where(attribute, condition) needs an attribute name');
    const parsed = parseOrThrow(ConditionSchema, condition, `Invalid condition for ${ctx.kind}.${attribute}`);
    return whereScope(set, attribute, checkCondition(ctx.kind, attribute, ctx.attributeType(attribute), parsed));
  }],
  ['order', (set, args) => {
    const [column, direction = 'asc'] = args;
    if (typeof column !== 'string') throw new ValidationError('order(column) needs a column name');
    if (direction !== 'asc' && direction !== 'desc') {
      throw new ValidationError(`order direction must be asc or desc, got ${String(direction)}`);
    }
    const dir: SortDirection = direction;
    return orderScope(set, column, dir);
  }]
]);

export const BUILTIN_SCOPES = [...BUILTINS.keys()];

/**
 * Named, per-kind record-set transforms. `where` and `order` exist for
 * every kind and cannot be redefined.
 */
export class ScopeEngine {
  private scopes = new Map<string, Map<string, ScopeFn>>();

  define(kind: string, name: string, fn: ScopeFn): void {
    const byName = this.scopes.get(kind) ?? new Map<string, ScopeFn>();
    if (BUILTINS.has(name) || byName.has(name)) throw new DuplicateScopeError(kind, name);
    byName.set(name, fn);
    this.scopes.set(kind, byName);
    log.debug({ kind, name }, 'scope-defined');
  }

  has(kind: string, name: string): boolean {
    return BUILTINS.has(name) || (this.scopes.get(kind)?.has(name) ?? false);
  }

  list(kind: string): string[] {
    return [...BUILTIN_SCOPES, ...(this.scopes.get(kind)?.keys() ?? [])];
  }

  apply(set: RecordSet, kind: string, name: string, args: readonly ScopeArg[], ctx: ScopeContext): DataRecord[] {
    const fn = BUILTINS.get(name) ?? this.scopes.get(kind)?.get(name);
    if (!fn) throw new UnknownScopeError(kind, name);
    return [...fn(set, args, ctx)];
  }
}
