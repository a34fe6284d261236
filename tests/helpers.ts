/* tests/helpers.ts */
import { Database } from '@recset/query';
import { defineLibrary } from '../apps/http/src/seed';
import type { DataRecord } from '@recset/core';

export const VIDEOS = [
  { name: 'Cat', engine: 'youtube', duration: 90 },
  { name: 'Dog', engine: 'youtube', duration: 120 },
  { name: 'Banana', engine: 'vimeo', duration: 140 },
  { name: 'Apple', engine: 'dailymotion', duration: 240 },
  { name: 'Orange', engine: 'dailymotion', duration: 30 }
] as const;

/** kinds + associations + scopes of the video library, no rows */
export function librarySchema(): Database {
  return defineLibrary(new Database());
}

export interface Library {
  db: Database;
  videos: Record<(typeof VIDEOS)[number]['name'], DataRecord>;
  animals: DataRecord;
  fruits: DataRecord;
}

/** the five videos, playlists "Animals" (Cat, Dog) and "Fruits" (Banana, Apple, Orange) */
export function seededLibrary(): Library {
  const db = librarySchema();
  const [cat, dog, banana, apple, orange] = VIDEOS.map((v) => db.insert('video', { ...v }));
  const animals = db.insert('playlist', { name: 'Animals' });
  const fruits = db.insert('playlist', { name: 'Fruits' });
  db.append(animals, 'videos', cat, dog);
  db.append(fruits, 'videos', banana, apple, orange);
  return {
    db,
    videos: { Cat: cat, Dog: dog, Banana: banana, Apple: apple, Orange: orange },
    animals,
    fruits
  };
}

export const names = (rows: readonly DataRecord[]) => rows.map((r) => r.attributes.name);
