import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { getLogger } from '../../utils/logger.js';
import { handleApiRequest, type ApiDeps } from './router.js';

export interface ApiServerOptions {
  host: string;
  port: number;
}

class InvalidJsonError extends Error {
  constructor() {
    super('Invalid JSON body');
    this.name = 'InvalidJsonError';
  }
}

async function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf-8');
      if (!raw.trim()) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch {
        reject(new InvalidJsonError());
      }
    });
    req.on('error', reject);
  });
}

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Cache-Control': 'no-cache',
    'Access-Control-Allow-Origin': '*',
  });
  res.end(JSON.stringify(data));
}

async function handle(deps: ApiDeps, req: IncomingMessage, res: ServerResponse, port: number): Promise<void> {
  const url = new URL(req.url ?? '/', `http://127.0.0.1:${port}`);
  const method = req.method ?? 'GET';

  // CORS preflight
  if (method === 'OPTIONS') {
    res.writeHead(204, {
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type',
    });
    res.end();
    return;
  }

  let body: unknown;
  if (method === 'POST') {
    try {
      body = await parseBody(req);
    } catch (err) {
      json(res, { error: err instanceof Error ? err.message : String(err) }, 400);
      return;
    }
  }

  const response = await handleApiRequest(deps, {
    method,
    pathname: url.pathname,
    query: url.searchParams,
    body,
  });
  json(res, response.body, response.status);
}

export function startApiServer(deps: ApiDeps, options: ApiServerOptions): { server: Server; stop: () => void } {
  const log = getLogger();
  const { host, port } = options;

  const server = createServer((req, res) => {
    handle(deps, req, res, port).catch((err: unknown) => {
      log.error({ err: err instanceof Error ? err.message : String(err) }, 'Unhandled API error');
      if (!res.headersSent) json(res, { error: 'Internal server error' }, 500);
      else res.end();
    });
  });

  server.listen(port, host);
  log.info({ host, port }, 'API server listening');

  return {
    server,
    stop: () => {
      server.close();
    },
  };
}
