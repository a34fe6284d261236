// packages/store/src/index.ts
import type { ZodTypeAny } from 'zod';
import {
  AttributeSchemaSchema, KindNameSchema, recordSchema, parseOrThrow, childLogger,
  DuplicateKindError, UnknownKindError, NotFoundError, ValidationError
} from '@recset/core';
import type {
  AttributeDef, AttributeSchema, AttributeType, Attributes, AttributeValue, DataRecord, EntityKind
} from '@recset/core';

const log = childLogger('store');

interface KindTable {
  kind: EntityKind;
  insertSchema: ZodTypeAny;
  patchSchema: ZodTypeAny;
  rows: Map<number, DataRecord>;
  nextId: number;
}

function normalize(schema: AttributeSchema): Record<string, AttributeDef> {
  const out: Record<string, AttributeDef> = {};
  for (const [name, def] of Object.entries(schema)) {
    out[name] = typeof def === 'string' ? { type: def } : { ...def };
  }
  return out;
}

// stored records are frozen; `update` swaps in a new snapshot
function freeze(kind: string, id: number, attributes: Attributes): DataRecord {
  return Object.freeze({ kind, id, attributes: Object.freeze(attributes) });
}

/**
 * In-memory record store. Holds one table per entity kind, assigns
 * per-kind auto-increment ids and keeps insertion order for `all()`.
 * Records handed out are read-only snapshots.
 */
export class RecordStore {
  private tables = new Map<string, KindTable>();

  defineKind(name: string, schema: AttributeSchema): EntityKind {
    parseOrThrow(KindNameSchema, name, `Invalid kind name '${name}'`);
    if (this.tables.has(name)) throw new DuplicateKindError(name);
    parseOrThrow(AttributeSchemaSchema, schema, `Invalid attribute schema for ${name}`);

    const kind: EntityKind = { name, attributes: normalize(schema) };
    const insertSchema = recordSchema(kind.attributes);
    this.tables.set(name, {
      kind,
      insertSchema,
      patchSchema: recordSchema(
        Object.fromEntries(Object.entries(kind.attributes).map(([k, d]) => [k, { ...d, required: false }]))
      ),
      rows: new Map(),
      nextId: 1
    });
    log.debug({ kind: name, attributes: Object.keys(kind.attributes) }, 'kind-defined');
    return kind;
  }

  hasKind(name: string): boolean {
    return this.tables.has(name);
  }

  kind(name: string): EntityKind {
    return this.table(name).kind;
  }

  kinds(): EntityKind[] {
    return [...this.tables.values()].map((t) => t.kind);
  }

  hasAttribute(kind: string, attribute: string): boolean {
    return attribute === 'id' || attribute in this.table(kind).kind.attributes;
  }

  /** declared type of an attribute; `id` is an integer, unknown names are undefined */
  attributeType(kind: string, attribute: string): AttributeType | undefined {
    if (attribute === 'id') return 'integer';
    return this.table(kind).kind.attributes[attribute]?.type;
  }

  insert(kind: string, attributes: Attributes): DataRecord {
    const t = this.table(kind);
    const withDefaults: Attributes = { ...attributes };
    for (const [name, def] of Object.entries(t.kind.attributes)) {
      if (withDefaults[name] === undefined && def.default !== undefined) withDefaults[name] = def.default;
    }
    if ('id' in withDefaults) throw new ValidationError(`Cannot insert ${kind}`, [{ path: 'id', msg: 'is assigned by the store' }]);
    const parsed = parseOrThrow(t.insertSchema, withDefaults, `Cannot insert ${kind}`);

    // every declared attribute is present on the stored record
    const stored: Attributes = {};
    for (const name of Object.keys(t.kind.attributes)) stored[name] = attributeValue(parsed, name);

    const rec = freeze(kind, t.nextId++, stored);
    t.rows.set(rec.id, rec);
    log.debug({ kind, id: rec.id }, 'insert');
    return rec;
  }

  find(kind: string, id: number): DataRecord | undefined {
    return this.table(kind).rows.get(id);
  }

  get(kind: string, id: number): DataRecord {
    const rec = this.find(kind, id);
    if (!rec) throw new NotFoundError(kind, id);
    return rec;
  }

  all(kind: string): DataRecord[] {
    return [...this.table(kind).rows.values()];
  }

  count(kind: string): number {
    return this.table(kind).rows.size;
  }

  /** validates `patch` against the kind and stores a new snapshot of the record */
  update(kind: string, id: number, patch: Attributes): DataRecord {
    const t = this.table(kind);
    const rec = t.rows.get(id);
    if (!rec) throw new NotFoundError(kind, id);
    if ('id' in patch) throw new ValidationError(`Cannot update ${kind} #${id}`, [{ path: 'id', msg: 'is immutable' }]);
    const parsed = parseOrThrow(t.patchSchema, patch, `Cannot update ${kind} #${id}`);

    const issues = Object.keys(patch)
      .filter((name) => t.kind.attributes[name]?.required && patch[name] === null)
      .map((name) => ({ path: name, msg: 'is required' }));
    if (issues.length) throw new ValidationError(`Cannot update ${kind} #${id}`, issues);

    const attributes: Attributes = { ...rec.attributes };
    for (const name of Object.keys(patch)) attributes[name] = attributeValue(parsed, name);
    const next = freeze(kind, id, attributes);
    t.rows.set(id, next);
    log.debug({ kind, id, attributes: Object.keys(patch) }, 'update');
    return next;
  }

  // no cascade: join records pointing at the removed id are the caller's concern
  delete(kind: string, id: number): boolean {
    const removed = this.table(kind).rows.delete(id);
    if (removed) log.debug({ kind, id }, 'delete');
    return removed;
  }

  private table(kind: string): KindTable {
    const t = this.tables.get(kind);
    if (!t) throw new UnknownKindError(kind);
    return t;
  }
}

function attributeValue(parsed: unknown, name: string): AttributeValue {
  if (typeof parsed !== 'object' || parsed === null) return null;
  const v: unknown = Reflect.get(parsed, name);
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  return null;
}
