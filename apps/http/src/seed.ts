// apps/http/src/seed.ts
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError, parseOrThrow, type DataRecord } from '@recset/core';
import { Database, range } from '@recset/query';

const SeedSchema = z.object({
  users: z.array(z.object({ name: z.string().min(1), bestFriend: z.string().optional() }).strict()),
  videos: z.array(z.object({
    name: z.string().min(1),
    engine: z.string().min(1),
    duration: z.number().int().min(0)
  }).strict()),
  playlists: z.array(z.object({
    name: z.string().min(1),
    owner: z.string().optional(),
    videos: z.array(z.string())
  }).strict())
});

export type SeedData = z.infer<typeof SeedSchema>;

const SEED_FILE = fileURLToPath(new URL('../seed/library.json', import.meta.url));

export function readSeed(file: string = SEED_FILE): SeedData {
  return parseOrThrow(SeedSchema, JSON.parse(fs.readFileSync(file, 'utf8')), `Invalid seed file ${file}`);
}

/** kinds, associations and scopes of the video library */
export function defineLibrary(db: Database): Database {
  db.defineKind('user', {
    name: { type: 'string', required: true },
    best_friend_id: 'integer'
  });
  db.defineKind('video', {
    name: { type: 'string', required: true },
    engine: { type: 'string', required: true },
    duration: { type: 'integer', required: true }
  });
  db.defineKind('playlist', {
    name: { type: 'string', required: true },
    user_id: 'integer'
  });
  db.defineKind('like', {
    playlist_id: { type: 'integer', required: true },
    video_id: { type: 'integer', required: true }
  });

  db.defineAssociation('user', 'best_friend', { type: 'one-to-one', target: 'user', foreignKey: 'best_friend_id' });
  db.defineAssociation('user', 'playlists', { type: 'one-to-many', target: 'playlist', foreignKey: 'user_id' });
  db.defineAssociation('playlist', 'owner', { type: 'one-to-one', target: 'user', foreignKey: 'user_id' });
  db.defineAssociation('playlist', 'likes', { type: 'one-to-many', target: 'like', foreignKey: 'playlist_id' });
  db.defineAssociation('playlist', 'videos', {
    type: 'many-to-many-through', target: 'video', through: 'like', sourceKey: 'playlist_id', targetKey: 'video_id'
  });
  db.defineAssociation('video', 'playlists', {
    type: 'many-to-many-through', target: 'playlist', through: 'like', sourceKey: 'video_id', targetKey: 'playlist_id'
  });

  db.defineScope('video', 'duration_min', (set, [min], ctx) => {
    const n = parseOrThrow(z.number(), min, 'duration_min(min) needs a number');
    return db.scopes.apply(set, 'video', 'where', ['duration', range(n)], ctx);
  });
  db.defineScope('video', 'sort', (set, [column], ctx) => {
    const col = parseOrThrow(z.string(), column, 'sort(column) needs a column name');
    return db.scopes.apply(set, 'video', 'order', [col], ctx);
  });
  db.defineScope('video', 'list', (set, [name], ctx) => {
    const playlist = parseOrThrow(z.string(), name, 'list(name) needs a playlist name');
    return ctx.merge(set, ctx.query('playlist').where('name', playlist).join('videos'));
  });
  db.defineScope('playlist', 'named', (set, [name], ctx) =>
    db.scopes.apply(set, 'playlist', 'where', ['name', name ?? null], ctx)
  );

  return db;
}

/** fresh database with the library defined and the seed rows loaded */
export function seedLibrary(data: SeedData = readSeed()): Database {
  const db = defineLibrary(new Database());

  const users = new Map<string, DataRecord>();
  for (const u of data.users) users.set(u.name, db.insert('user', { name: u.name }));
  for (const u of data.users) {
    if (!u.bestFriend) continue;
    db.assign(lookup(users, 'user', u.name), 'best_friend', lookup(users, 'user', u.bestFriend));
  }

  const videos = new Map<string, DataRecord>();
  for (const v of data.videos) videos.set(v.name, db.insert('video', { ...v }));

  for (const p of data.playlists) {
    const playlist = db.insert('playlist', { name: p.name });
    if (p.owner) db.assign(playlist, 'owner', lookup(users, 'user', p.owner));
    db.append(playlist, 'videos', ...p.videos.map((name) => lookup(videos, 'video', name)));
  }
  return db;
}

function lookup(rows: Map<string, DataRecord>, kind: string, name: string): DataRecord {
  const rec = rows.get(name);
  if (!rec) throw new ValidationError(`Seed refers to unknown ${kind} '${name}'`);
  return rec;
}
