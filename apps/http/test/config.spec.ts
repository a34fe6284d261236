import { describe, it, expect } from 'vitest';
import { ValidationError } from '@recset/core';
import { loadConfig } from '../src/config';
import { readSeed, seedLibrary } from '../src/seed';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 4000,
      host: '0.0.0.0',
      logLevel: 'info',
      corsOrigins: [],
      rateLimitMax: 600,
      reportMinDuration: 100
    });
  });

  it('coerces numbers and splits the CORS list', () => {
    const config = loadConfig({ PORT: '8080', CORS_ORIGIN: 'http://a.test, http://b.test,', RATE_LIMIT_MAX: '10' });
    expect(config.port).toBe(8080);
    expect(config.rateLimitMax).toBe(10);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('fails on invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ValidationError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/Invalid environment: LOG_LEVEL/);
  });
});

describe('seed', () => {
  it('reads the bundled library', () => {
    const data = readSeed();
    expect(data.videos.map((v) => v.name)).toEqual(['Cat', 'Dog', 'Banana', 'Apple', 'Orange']);
    expect(data.playlists.map((p) => p.name)).toEqual(['Animals', 'Fruits']);
  });

  it('wires owners, best friends and playlist videos', () => {
    const db = seedLibrary();
    const [ann] = db.all('user');
    expect(db.resolveOne(ann, 'best_friend')?.attributes.name).toBe('Bob');
    expect(db.resolveMany(ann, 'playlists').map((p) => p.attributes.name)).toEqual(['Animals']);
    expect(db.query('playlist').where('name', 'Fruits').join('videos').pluck('name')).toEqual(['Banana', 'Apple', 'Orange']);
    expect(db.query('playlist').scope('named', 'Animals').join('owner').pluck('name')).toEqual(['Ann']);
  });

  it('rejects references to unknown records', () => {
    const data = {
      users: [],
      videos: [{ name: 'Cat', engine: 'youtube', duration: 90 }],
      playlists: [{ name: 'Mixed', videos: ['Cat', 'Eel'] }]
    };
    expect(() => seedLibrary(data)).toThrow("Seed refers to unknown video 'Eel'");
  });
});
