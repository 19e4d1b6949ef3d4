import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DEFAULT_DATA_DIR } from '../../config.js';
import { CatalogError } from '../../errors.js';
import { loadCatalog } from './loader.js';

const tempDirs: string[] = [];

/** Copy the bundled tables into a temp dir, replacing `file` with `contents`. */
function dataDirWith(file: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'postcraft-catalog-'));
  tempDirs.push(dir);
  for (const name of fs.readdirSync(DEFAULT_DATA_DIR)) {
    fs.copyFileSync(path.join(DEFAULT_DATA_DIR, name), path.join(dir, name));
  }
  fs.writeFileSync(path.join(dir, file), contents, 'utf-8');
  return dir;
}

function platformsWith(patch: (tables: { profiles: Record<string, Record<string, unknown>> }) => void): string {
  const tables = JSON.parse(fs.readFileSync(path.join(DEFAULT_DATA_DIR, 'platforms.json'), 'utf-8'));
  patch(tables);
  return JSON.stringify(tables);
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('loadCatalog', () => {
  it('loads the bundled tables', () => {
    const catalog = loadCatalog(DEFAULT_DATA_DIR);

    expect(Object.keys(catalog.platforms)).toEqual(['instagram', 'facebook', 'twitter', 'linkedin', 'tiktok']);
    expect(Object.keys(catalog.voices)).toEqual(['professional', 'casual', 'educational', 'inspirational']);
    expect(catalog.platforms.twitter?.optimalLength).toEqual([71, 240]);
    expect(catalog.posting.twitter?.maxChars).toBe(280);
  });

  it('keeps every optimal hashtag range within the platform maximum', () => {
    const catalog = loadCatalog(DEFAULT_DATA_DIR);
    for (const profile of Object.values(catalog.platforms)) {
      expect(profile.optimalHashtags[1]).toBeLessThanOrEqual(profile.maxHashtags);
    }
  });

  it('returns a frozen catalog', () => {
    const catalog = loadCatalog(DEFAULT_DATA_DIR);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.hashtags.popular)).toBe(true);
  });

  it('rejects a file that is not JSON', () => {
    const dir = dataDirWith('voices.json', '{ not json');
    expect(() => loadCatalog(dir)).toThrow(CatalogError);
    expect(() => loadCatalog(dir)).toThrow('voices.json: could not be read as JSON');
  });

  it('rejects an optimal hashtag range above max_hashtags', () => {
    const dir = dataDirWith(
      'platforms.json',
      platformsWith((t) => {
        const twitter = t.profiles.twitter;
        if (twitter) twitter.max_hashtags = 1;
      }),
    );
    expect(() => loadCatalog(dir)).toThrow('optimal_hashtags maximum must not exceed max_hashtags');
  });

  it('requires the instagram profile', () => {
    const dir = dataDirWith(
      'platforms.json',
      platformsWith((t) => {
        delete t.profiles.instagram;
      }),
    );
    expect(() => loadCatalog(dir)).toThrow('platforms.json: the instagram profile is required');
  });
});
