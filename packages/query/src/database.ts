// packages/query/src/database.ts
import type {
  AssociationDefinition, AssociationSpec, AttributeSchema, Attributes, DataRecord, EntityKind, ScopeFn
} from '@recset/core';
import { RecordStore } from '@recset/store';
import { AssociationRegistry } from '@recset/associations';
import { ScopeEngine } from '@recset/scopes';
import { QueryExecutor } from './executor';
import type { QueryPlan } from './plan';

/**
 * One self-contained data layer: its own store, association registry and
 * scope engine. Declare kinds, associations and scopes up front, then
 * insert and query.
 */
export class Database {
  readonly store = new RecordStore();
  readonly associations = new AssociationRegistry(this.store);
  readonly scopes = new ScopeEngine();
  readonly executor = new QueryExecutor(this.store, this.associations, this.scopes);

  // ---- setup ----
  defineKind(name: string, schema: AttributeSchema): EntityKind {
    return this.store.defineKind(name, schema);
  }

  defineAssociation(kind: string, name: string, spec: AssociationSpec): AssociationDefinition {
    return this.associations.define(kind, name, spec);
  }

  defineScope(kind: string, name: string, fn: ScopeFn): void {
    this.store.kind(kind);
    this.scopes.define(kind, name, fn);
  }

  // ---- records ----
  insert(kind: string, attributes: Attributes): DataRecord {
    return this.store.insert(kind, attributes);
  }

  get(kind: string, id: number): DataRecord {
    return this.store.get(kind, id);
  }

  all(kind: string): DataRecord[] {
    return this.store.all(kind);
  }

  update(kind: string, id: number, patch: Attributes): DataRecord {
    return this.store.update(kind, id, patch);
  }

  delete(kind: string, id: number): boolean {
    return this.store.delete(kind, id);
  }

  // ---- associations ----
  resolve(record: DataRecord, name: string): DataRecord | DataRecord[] | undefined {
    return this.associations.resolve(record, name);
  }

  resolveOne(record: DataRecord, name: string): DataRecord | undefined {
    return this.associations.resolveOne(record, name);
  }

  resolveMany(record: DataRecord, name: string): DataRecord[] {
    return this.associations.resolveMany(record, name);
  }

  assign(record: DataRecord, name: string, other: DataRecord | null): DataRecord {
    return this.associations.assign(record, name, other);
  }

  append(record: DataRecord, name: string, ...items: DataRecord[]): DataRecord[] {
    return this.associations.append(record, name, items);
  }

  // ---- queries ----
  query(kind: string): QueryPlan {
    return this.executor.query(kind);
  }
}
