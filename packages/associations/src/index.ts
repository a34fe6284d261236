// packages/associations/src/index.ts
import {
  AssociationSpecSchema, parseOrThrow, childLogger,
  DuplicateAssociationError, UnknownAssociationError, UnknownKindError, NotFoundError, ValidationError
} from '@recset/core';
import type { AssociationDefinition, AssociationSpec, DataRecord } from '@recset/core';
import type { RecordStore } from '@recset/store';

const log = childLogger('associations');

type Through = Extract<AssociationDefinition, { type: 'many-to-many-through' }>;

/**
 * Declared relations between kinds. Target and join kinds are referenced by
 * name and looked up on use, so definitions may come in any order.
 */
export class AssociationRegistry {
  private defs = new Map<string, Map<string, AssociationDefinition>>();
  private checked = new Set<AssociationDefinition>();

  constructor(private store: RecordStore) {}

  define(source: string, name: string, spec: AssociationSpec): AssociationDefinition {
    if (!this.store.hasKind(source)) throw new UnknownKindError(source);
    const parsed = parseOrThrow(AssociationSpecSchema, spec, `Invalid association ${source}.${name}`);

    const byName = this.defs.get(source) ?? new Map<string, AssociationDefinition>();
    if (byName.has(name)) throw new DuplicateAssociationError(source, name);

    // the source side is known now; the other side is checked on first use
    if (parsed.type === 'one-to-one' && !this.store.hasAttribute(source, parsed.foreignKey)) {
      throw new ValidationError(`Invalid association ${source}.${name}`, [
        { path: 'foreignKey', msg: `${source} has no attribute '${parsed.foreignKey}'` }
      ]);
    }

    const def: AssociationDefinition = { ...parsed, source, name };
    byName.set(name, def);
    this.defs.set(source, byName);
    log.debug({ source, name, type: def.type, target: def.target }, 'association-defined');
    return def;
  }

  has(kind: string, name: string): boolean {
    return this.defs.get(kind)?.has(name) ?? false;
  }

  get(kind: string, name: string): AssociationDefinition {
    const def = this.defs.get(kind)?.get(name);
    if (!def) throw new UnknownAssociationError(kind, name);
    return def;
  }

  list(kind: string): AssociationDefinition[] {
    return [...(this.defs.get(kind)?.values() ?? [])];
  }

  resolve(record: DataRecord, name: string): DataRecord | DataRecord[] | undefined {
    const def = this.usable(record.kind, name);
    switch (def.type) {
      case 'one-to-one': {
        // records are snapshots; read the key as stored now
        const fk = this.store.get(record.kind, record.id).attributes[def.foreignKey];
        if (fk === null || fk === undefined) return undefined;
        if (typeof fk !== 'number') {
          throw new ValidationError(`${record.kind}.${def.foreignKey} is not an id`, [
            { path: def.foreignKey, msg: `expected integer, got ${typeof fk}` }
          ]);
        }
        return this.store.get(def.target, fk);
      }
      case 'one-to-many':
        return this.store.all(def.target).filter((t) => t.attributes[def.foreignKey] === record.id);
      case 'many-to-many-through':
        return this.joinRows(def, record.id).map((j) => this.throughTarget(def, j));
    }
  }

  resolveOne(record: DataRecord, name: string): DataRecord | undefined {
    const out = this.resolve(record, name);
    if (Array.isArray(out)) {
      throw new ValidationError(`${record.kind}.${name} is a collection; use resolveMany`);
    }
    return out;
  }

  resolveMany(record: DataRecord, name: string): DataRecord[] {
    const out = this.resolve(record, name);
    if (!Array.isArray(out)) {
      throw new ValidationError(`${record.kind}.${name} is a single reference; use resolveOne`);
    }
    return out;
  }

  /** one-to-one write: stores `other.id` (or null) in the source's foreign key right away */
  assign(record: DataRecord, name: string, other: DataRecord | null): DataRecord {
    const def = this.usable(record.kind, name);
    if (def.type !== 'one-to-one') {
      throw new ValidationError(`${record.kind}.${name} is ${def.type}; only one-to-one can be assigned`);
    }
    if (other) this.expectKind(def, other);
    return this.store.update(record.kind, record.id, { [def.foreignKey]: other ? other.id : null });
  }

  /**
   * Collection append. Through-associations insert one join record per item
   * in order (repeats included unless the association sets `dedupe`);
   * one-to-many writes the source id into each item's foreign key.
   */
  append(record: DataRecord, name: string, items: readonly DataRecord[]): DataRecord[] {
    const def = this.usable(record.kind, name);
    if (def.type === 'one-to-one') {
      throw new ValidationError(`${record.kind}.${name} is one-to-one; use assign`);
    }
    for (const item of items) this.expectKind(def, item);

    if (def.type === 'one-to-many') {
      return items.map((item) => this.store.update(def.target, item.id, { [def.foreignKey]: record.id }));
    }

    const created: DataRecord[] = [];
    for (const item of items) {
      if (def.dedupe && this.joinRows(def, record.id).some((j) => j.attributes[def.targetKey] === item.id)) continue;
      created.push(this.store.insert(def.through, { [def.sourceKey]: record.id, [def.targetKey]: item.id }));
    }
    log.debug({ source: record.kind, id: record.id, name, appended: created.length }, 'append');
    return created;
  }

  private joinRows(def: Through, sourceId: number): DataRecord[] {
    return this.store.all(def.through).filter((j) => j.attributes[def.sourceKey] === sourceId);
  }

  private throughTarget(def: Through, join: DataRecord): DataRecord {
    const id = join.attributes[def.targetKey];
    if (typeof id !== 'number') {
      throw new ValidationError(`${def.through} #${join.id} has no ${def.targetKey}`);
    }
    return this.store.get(def.target, id);
  }

  private expectKind(def: AssociationDefinition, item: DataRecord): void {
    if (item.kind !== def.target) {
      throw new ValidationError(`${def.source}.${def.name} expects ${def.target}, got ${item.kind} #${item.id}`);
    }
  }

  // late check of the target side (kinds may be defined after the association)
  private usable(kind: string, name: string): AssociationDefinition {
    const def = this.get(kind, name);
    if (this.checked.has(def)) return def;

    const need: Array<[string, string]> =
      def.type === 'one-to-many' ? [[def.target, def.foreignKey]]
      : def.type === 'many-to-many-through' ? [[def.through, def.sourceKey], [def.through, def.targetKey]]
      : [];
    if (!this.store.hasKind(def.target)) throw new UnknownKindError(def.target);
    for (const [owner, key] of need) {
      if (!this.store.hasAttribute(owner, key)) {
        throw new ValidationError(`Invalid association ${def.source}.${def.name}`, [
          { path: key, msg: `${owner} has no attribute '${key}'` }
        ]);
      }
    }
    this.checked.add(def);
    return def;
  }
}
