import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { DEFAULT_DATA_DIR } from '../../config.js';
import { loadCatalog } from '../catalog/loader.js';
import { UnavailableCompletionClient } from '../completion/client.js';
import { startApiServer } from './server.js';

let api: ReturnType<typeof startApiServer>;
let baseUrl: string;

beforeAll(async () => {
  api = startApiServer(
    { catalog: loadCatalog(DEFAULT_DATA_DIR), completion: new UnavailableCompletionClient(), rng: () => 0 },
    { host: '127.0.0.1', port: 0 },
  );
  if (!api.server.listening) {
    await new Promise<void>((resolve) => api.server.once('listening', () => resolve()));
  }
  const address = api.server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(() => {
  api.stop();
});

describe('startApiServer', () => {
  it('answers JSON with CORS headers', async () => {
    const res = await fetch(`${baseUrl}/platforms`);

    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(await res.json()).toHaveProperty('supported_platforms');
  });

  it('answers CORS preflight with 204', async () => {
    const res = await fetch(`${baseUrl}/analyze`, { method: 'OPTIONS' });
    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-methods')).toBe('GET, POST, OPTIONS');
  });

  it('rejects a malformed JSON body', async () => {
    const res = await fetch(`${baseUrl}/analyze`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{ broken',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('treats an empty POST body as no fields', async () => {
    const res = await fetch(`${baseUrl}/analyze`, { method: 'POST' });
    expect(res.status).toBe(200);
  });
});
