import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { getLogger } from '../../utils/logger.js';
import { CatalogError } from '../../errors.js';
import {
  captionsFileSchema,
  hashtagsFileSchema,
  platformsFileSchema,
  postingTipsFileSchema,
  scriptsFileSchema,
  voicesFileSchema,
  type ContentCatalog,
} from './schema.js';

export const DEFAULT_PLATFORM = 'instagram';

function readTable<S extends z.ZodTypeAny>(dataDir: string, file: string, schema: S): z.output<S> {
  const filePath = path.join(dataDir, file);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new CatalogError(file, 'could not be read as JSON', { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new CatalogError(file, issues.join('; '));
  }
  return parsed.data;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Load and validate every static table under `dataDir`. The result is frozen
 * and meant to be built once per process and passed to each component.
 */
export function loadCatalog(dataDir: string): ContentCatalog {
  const log = getLogger();
  const platformsFile = readTable(dataDir, 'platforms.json', platformsFileSchema);
  const tips = readTable(dataDir, 'posting-tips.json', postingTipsFileSchema);

  if (!Object.hasOwn(platformsFile.profiles, DEFAULT_PLATFORM)) {
    throw new CatalogError('platforms.json', `the ${DEFAULT_PLATFORM} profile is required`);
  }
  for (const platform of Object.keys(platformsFile.profiles)) {
    if (!Object.hasOwn(platformsFile.posting, platform)) {
      throw new CatalogError('platforms.json', `missing posting spec for ${platform}`);
    }
  }

  const catalog: ContentCatalog = {
    platforms: platformsFile.profiles,
    posting: platformsFile.posting,
    voices: readTable(dataDir, 'voices.json', voicesFileSchema),
    hashtags: readTable(dataDir, 'hashtags.json', hashtagsFileSchema),
    captions: readTable(dataDir, 'captions.json', captionsFileSchema),
    scripts: readTable(dataDir, 'scripts.json', scriptsFileSchema),
    tips,
  };

  log.debug(
    { platforms: Object.keys(catalog.platforms).length, voices: Object.keys(catalog.voices).length },
    'Catalog loaded',
  );

  return deepFreeze(catalog);
}
