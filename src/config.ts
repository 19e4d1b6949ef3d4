import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Project root sits one level above both src/ (tsx, vitest) and dist/ (compiled)
const PROJECT_ROOT = path.resolve(__dirname, '..');

export const DEFAULT_DATA_DIR = path.resolve(PROJECT_ROOT, 'data');

export interface Config {
  // Anthropic (optional; generators fall back to templates without it)
  anthropicApiKey: string;
  completionModel: string;
  completionMaxTokens: number;

  // Blog extraction
  fetchTimeoutMs: number;

  // Paths
  dataDir: string;

  // API server
  host: string;
  port: number;

  // Logging
  logLevel: string;
}

function loadEnvFile(): void {
  const envPath = path.resolve(PROJECT_ROOT, '.env');

  let envText: string;
  try {
    envText = fs.readFileSync(envPath, 'utf-8');
  } catch {
    return; // .env is optional
  }

  for (const line of envText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim();
      if (!process.env[key]) process.env[key] = val;
    }
  }
}

function loadRcFile(): Record<string, unknown> {
  const rcPath = path.resolve(PROJECT_ROOT, '.postcraftrc.json');
  let raw: string;
  try {
    raw = fs.readFileSync(rcPath, 'utf-8');
  } catch {
    return {};
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${rcPath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function loadConfig(overrides: Partial<Config> = {}): Config {
  loadEnvFile();
  const rc = loadRcFile();

  const str = (envKey: string, fallback = ''): string => {
    const fromEnv = process.env[envKey];
    if (fromEnv) return fromEnv;
    const fromRc = rc[envKey];
    return typeof fromRc === 'string' ? fromRc : fallback;
  };

  const num = (envKey: string, fallback: number): number => {
    const fromRc = rc[envKey];
    return Number(process.env[envKey]) || (typeof fromRc === 'number' ? fromRc : fallback);
  };

  return {
    anthropicApiKey: overrides.anthropicApiKey ?? str('ANTHROPIC_API_KEY'),
    completionModel: overrides.completionModel ?? str('COMPLETION_MODEL', 'claude-sonnet-4-5-20250929'),
    completionMaxTokens: overrides.completionMaxTokens ?? num('COMPLETION_MAX_TOKENS', 200),

    fetchTimeoutMs: overrides.fetchTimeoutMs ?? num('FETCH_TIMEOUT_MS', 10_000),

    dataDir: overrides.dataDir ?? str('POSTCRAFT_DATA_DIR', DEFAULT_DATA_DIR),

    host: overrides.host ?? str('API_HOST', '127.0.0.1'),
    port: overrides.port ?? num('API_PORT', 8002),

    logLevel: overrides.logLevel ?? str('LOG_LEVEL', 'info'),
  };
}
