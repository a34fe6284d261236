/* packages/associations/test/associations.spec.ts */
import { describe, it, expect, beforeEach } from 'vitest';
import { RecordStore } from '@recset/store';
import { AssociationRegistry } from '../src';
import {
  DuplicateAssociationError, NotFoundError, UnknownAssociationError, UnknownKindError, ValidationError
} from '@recset/core';

const names = (rows: readonly { attributes: Record<string, unknown> }[]) => rows.map((r) => r.attributes.name);

describe('AssociationRegistry', () => {
  let store: RecordStore;
  let reg: AssociationRegistry;

  beforeEach(() => {
    store = new RecordStore();
    reg = new AssociationRegistry(store);
    store.defineKind('user', { name: { type: 'string', required: true }, best_friend_id: 'integer' });
    store.defineKind('playlist', { name: { type: 'string', required: true }, user_id: 'integer' });
    store.defineKind('video', { name: { type: 'string', required: true } });
    store.defineKind('like', {
      playlist_id: { type: 'integer', required: true },
      video_id: { type: 'integer', required: true }
    });
  });

  describe('define', () => {
    it('rejects a name already used on the kind', () => {
      reg.define('user', 'best_friend', { type: 'one-to-one', target: 'user', foreignKey: 'best_friend_id' });
      expect(() =>
        reg.define('user', 'best_friend', { type: 'one-to-many', target: 'playlist', foreignKey: 'user_id' })
      ).toThrow(DuplicateAssociationError);
      // same name on another kind is fine
      expect(() =>
        reg.define('playlist', 'best_friend', { type: 'one-to-one', target: 'user', foreignKey: 'user_id' })
      ).not.toThrow();
    });

    it('requires the source kind and, for one-to-one, its foreign key', () => {
      expect(() => reg.define('channel', 'owner', { type: 'one-to-one', target: 'user', foreignKey: 'user_id' }))
        .toThrow(UnknownKindError);
      expect(() => reg.define('video', 'owner', { type: 'one-to-one', target: 'user', foreignKey: 'user_id' }))
        .toThrow("video has no attribute 'user_id'");
    });

    it('validates the definition shape', () => {
      expect(() => reg.define('user', 'x', { type: 'one-to-many', target: 'playlist', foreignKey: '' }))
        .toThrow(ValidationError);
    });

    it('lets targets be defined after the association', () => {
      reg.define('user', 'badges', { type: 'one-to-many', target: 'badge', foreignKey: 'user_id' });
      const ann = store.insert('user', { name: 'Ann' });
      expect(() => reg.resolve(ann, 'badges')).toThrow(UnknownKindError);

      store.defineKind('badge', { user_id: 'integer' });
      store.insert('badge', { user_id: ann.id });
      expect(reg.resolveMany(ann, 'badges')).toHaveLength(1);
    });

    it('checks join keys when the association is first used', () => {
      reg.define('playlist', 'videos', {
        type: 'many-to-many-through', target: 'video', through: 'like', sourceKey: 'list_id', targetKey: 'video_id'
      });
      const p = store.insert('playlist', { name: 'Animals' });
      expect(() => reg.resolve(p, 'videos')).toThrow("like has no attribute 'list_id'");
    });

    it('fails for unknown associations', () => {
      const ann = store.insert('user', { name: 'Ann' });
      expect(() => reg.resolve(ann, 'nope')).toThrow(UnknownAssociationError);
      expect(reg.has('user', 'nope')).toBe(false);
    });
  });

  describe('one-to-one', () => {
    beforeEach(() => {
      reg.define('user', 'best_friend', { type: 'one-to-one', target: 'user', foreignKey: 'best_friend_id' });
    });

    it('resolves to nothing while the key is unset', () => {
      const ann = store.insert('user', { name: 'Ann' });
      expect(reg.resolve(ann, 'best_friend')).toBeUndefined();
    });

    it('assign writes the foreign key immediately and resolve returns the target', () => {
      const ann = store.insert('user', { name: 'Ann' });
      const bob = store.insert('user', { name: 'Bob' });
      reg.assign(ann, 'best_friend', bob);
      expect(store.get('user', ann.id).attributes.best_friend_id).toBe(bob.id);
      expect(reg.resolveOne(ann, 'best_friend')).toBe(bob);

      const cleared = reg.assign(ann, 'best_friend', null);
      expect(cleared.attributes.best_friend_id).toBeNull();
      expect(reg.resolveOne(ann, 'best_friend')).toBeUndefined();
    });

    it('supports pointing a record at itself', () => {
      const ann = store.insert('user', { name: 'Ann' });
      const self = reg.assign(ann, 'best_friend', ann);
      expect(reg.resolve(ann, 'best_friend')).toBe(self);
    });

    it('throws NotFoundError for a dangling key', () => {
      const ann = store.insert('user', { name: 'Ann', best_friend_id: 99 });
      expect(() => reg.resolve(ann, 'best_friend')).toThrow(NotFoundError);
    });

    it('rejects targets of the wrong kind and collection calls', () => {
      const ann = store.insert('user', { name: 'Ann' });
      const v = store.insert('video', { name: 'Cat' });
      expect(() => reg.assign(ann, 'best_friend', v)).toThrow('user.best_friend expects user, got video #1');
      expect(() => reg.append(ann, 'best_friend', [ann])).toThrow(ValidationError);
      expect(() => reg.resolveMany(ann, 'best_friend')).toThrow(ValidationError);
    });
  });

  describe('one-to-many', () => {
    beforeEach(() => {
      reg.define('user', 'playlists', { type: 'one-to-many', target: 'playlist', foreignKey: 'user_id' });
    });

    it('returns targets carrying the source id, in insertion order', () => {
      const ann = store.insert('user', { name: 'Ann' });
      const bob = store.insert('user', { name: 'Bob' });
      store.insert('playlist', { name: 'Fruits', user_id: ann.id });
      store.insert('playlist', { name: 'Mixed', user_id: bob.id });
      store.insert('playlist', { name: 'Animals', user_id: ann.id });
      expect(names(reg.resolveMany(ann, 'playlists'))).toEqual(['Fruits', 'Animals']);
    });

    it('append writes the source id into each item', () => {
      const ann = store.insert('user', { name: 'Ann' });
      const p = store.insert('playlist', { name: 'Loose' });
      const [moved] = reg.append(ann, 'playlists', [p]);
      expect(moved.attributes.user_id).toBe(ann.id);
      expect(store.get('playlist', p.id)).toBe(moved);
      expect(() => reg.assign(ann, 'playlists', p)).toThrow(/only one-to-one can be assigned/);
      expect(() => reg.resolveOne(ann, 'playlists')).toThrow(ValidationError);
    });
  });

  describe('many-to-many-through', () => {
    const through = { type: 'many-to-many-through', target: 'video', through: 'like', sourceKey: 'playlist_id', targetKey: 'video_id' } as const;

    it('follows join records in insertion order, keeping repeats', () => {
      reg.define('playlist', 'videos', through);
      const p = store.insert('playlist', { name: 'Mix' });
      const [cat, dog] = ['Cat', 'Dog'].map((name) => store.insert('video', { name }));

      reg.append(p, 'videos', [dog, cat]);
      expect(names(reg.resolveMany(p, 'videos'))).toEqual(['Dog', 'Cat']);

      const created = reg.append(p, 'videos', [dog]);
      expect(created).toHaveLength(1);
      expect(names(reg.resolveMany(p, 'videos'))).toEqual(['Dog', 'Cat', 'Dog']);
      expect(store.count('like')).toBe(3);
    });

    it('grows by exactly the number of appended items', () => {
      reg.define('playlist', 'videos', through);
      const p = store.insert('playlist', { name: 'Mix' });
      const cat = store.insert('video', { name: 'Cat' });
      const before = reg.resolveMany(p, 'videos').length;
      reg.append(p, 'videos', [cat, cat, cat]);
      expect(reg.resolveMany(p, 'videos').length).toBe(before + 3);
    });

    it('skips existing pairs when defined with dedupe', () => {
      reg.define('playlist', 'videos', { ...through, dedupe: true });
      const p = store.insert('playlist', { name: 'Mix' });
      const cat = store.insert('video', { name: 'Cat' });
      const dog = store.insert('video', { name: 'Dog' });
      reg.append(p, 'videos', [cat, dog, cat]);
      expect(names(reg.resolveMany(p, 'videos'))).toEqual(['Cat', 'Dog']);
    });

    it('only sees join records of its own source', () => {
      reg.define('playlist', 'videos', through);
      const a = store.insert('playlist', { name: 'A' });
      const b = store.insert('playlist', { name: 'B' });
      const cat = store.insert('video', { name: 'Cat' });
      const dog = store.insert('video', { name: 'Dog' });
      reg.append(a, 'videos', [cat]);
      reg.append(b, 'videos', [dog]);
      expect(names(reg.resolveMany(a, 'videos'))).toEqual(['Cat']);
      expect(names(reg.resolveMany(b, 'videos'))).toEqual(['Dog']);
    });
  });
});
