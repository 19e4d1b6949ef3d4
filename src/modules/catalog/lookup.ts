import { CatalogError, UnsupportedPlatformError, UnsupportedVoiceError } from '../../errors.js';
import { DEFAULT_PLATFORM } from './loader.js';
import type { BrandVoiceProfile, ContentCatalog, PlatformProfile, PostingSpec } from './schema.js';

export function listPlatforms(catalog: ContentCatalog): string[] {
  return Object.keys(catalog.platforms);
}

export function listVoices(catalog: ContentCatalog): string[] {
  return Object.keys(catalog.voices);
}

/**
 * Canonical (lower-case) platform key, or UnsupportedPlatformError.
 */
export function normalizePlatform(catalog: ContentCatalog, name: string): string {
  const key = name.trim().toLowerCase();
  if (!Object.hasOwn(catalog.platforms, key)) {
    throw new UnsupportedPlatformError(name, listPlatforms(catalog));
  }
  return key;
}

export function getPlatformProfile(catalog: ContentCatalog, name: string): PlatformProfile {
  const profile = catalog.platforms[normalizePlatform(catalog, name)];
  if (!profile) throw new UnsupportedPlatformError(name, listPlatforms(catalog));
  return profile;
}

/**
 * Scorer-side lookup: an unknown key falls back to the instagram profile
 * instead of failing. Boundaries validate with getPlatformProfile first.
 */
export function resolvePlatformProfile(catalog: ContentCatalog, name: string): PlatformProfile {
  const key = name.toLowerCase();
  const profile = Object.hasOwn(catalog.platforms, key) ? catalog.platforms[key] : catalog.platforms[DEFAULT_PLATFORM];
  if (!profile) throw new CatalogError('platforms.json', `the ${DEFAULT_PLATFORM} profile is required`);
  return profile;
}

export function getPostingSpec(catalog: ContentCatalog, name: string): PostingSpec {
  const spec = catalog.posting[normalizePlatform(catalog, name)];
  if (!spec) throw new UnsupportedPlatformError(name, listPlatforms(catalog));
  return spec;
}

export function getVoice(catalog: ContentCatalog, name: string): BrandVoiceProfile {
  const key = name.trim().toLowerCase();
  const voice = Object.hasOwn(catalog.voices, key) ? catalog.voices[key] : undefined;
  if (!voice) throw new UnsupportedVoiceError(name, listVoices(catalog));
  return voice;
}

/**
 * Own-property read of a catalog table, so keys like "constructor" miss.
 */
export function ownEntry<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}
