// packages/scopes/src/builtins.ts
// Built-in `where` / `order` transforms, shared by every kind.
import { ValidationError } from '@recset/core';
import type {
  AttributeType, AttributeValue, Condition, DataRecord, Issue, Range, RecordSet, SortDirection
} from '@recset/core';

export function range(from?: string | number, to?: string | number): Range {
  return { ...(from !== undefined ? { from } : {}), ...(to !== undefined ? { to } : {}) };
}

export function isRange(c: Condition): c is Range {
  return typeof c === 'object' && c !== null && !Array.isArray(c);
}

function isList(c: Condition): c is readonly AttributeValue[] {
  return Array.isArray(c);
}

function fits(type: AttributeType, v: string | number | boolean): boolean {
  switch (type) {
    case 'string': return typeof v === 'string';
    case 'integer':
    case 'float': return typeof v === 'number';
    case 'boolean': return typeof v === 'boolean';
  }
}

/** values and range bounds must match the attribute's declared type; null always passes */
export function conditionIssues(type: AttributeType, condition: Condition): Issue[] {
  const check = (v: AttributeValue | undefined, path: string): Issue[] =>
    v === undefined || v === null || fits(type, v) ? [] : [{ path, msg: `expected ${type}, got ${typeof v}` }];
  if (isList(condition)) return condition.flatMap((v, i) => check(v, String(i)));
  if (isRange(condition)) {
    if (type === 'boolean') return [{ path: '', msg: 'boolean attributes take no range' }];
    return [...check(condition.from, 'from'), ...check(condition.to, 'to')];
  }
  return check(condition, '');
}

export function checkCondition(
  kind: string, attribute: string, type: AttributeType | undefined, condition: Condition
): Condition {
  if (!type) throw new ValidationError(`Unknown attribute ${kind}.${attribute}`);
  const issues = conditionIssues(type, condition);
  if (issues.length) throw new ValidationError(`Invalid condition for ${kind}.${attribute}`, issues);
  return condition;
}

export function readAttribute(rec: DataRecord, attribute: string): AttributeValue {
  if (attribute === 'id') return rec.id;
  return rec.attributes[attribute] ?? null;
}

// natural ordering: numbers numerically, strings by code unit, false < true
export function compareValues(a: AttributeValue, b: AttributeValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return a ? 1 : -1;
  const sa = String(a), sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function inRange(v: AttributeValue, r: Range): boolean {
  if (v === null || typeof v === 'boolean') return false;
  if (r.from !== undefined && compareValues(v, r.from) < 0) return false;
  if (r.to !== undefined && compareValues(v, r.to) > 0) return false;
  return true;
}

export function matches(v: AttributeValue, condition: Condition): boolean {
  if (Array.isArray(condition)) return condition.includes(v);
  if (isRange(condition)) return inRange(v, condition);
  return v === condition;
}

export function whereScope(set: RecordSet, attribute: string, condition: Condition): DataRecord[] {
  return set.filter((rec) => matches(readAttribute(rec, attribute), condition));
}

/** stable sort; nulls last in both directions */
export function orderScope(set: RecordSet, column: string, direction: SortDirection = 'asc'): DataRecord[] {
  const sign = direction === 'desc' ? -1 : 1;
  return [...set].sort((x, y) => {
    const a = readAttribute(x, column), b = readAttribute(y, column);
    if (a === null || b === null) return compareValues(a, b);
    return sign * compareValues(a, b);
  });
}
