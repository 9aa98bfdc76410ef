import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';

import { logger } from '../../middleware/logger.js';
import type { MarketplaceEngine } from '../../engine.js';
import { parseInboundEvent } from './inbound.js';

/**
 * JSON-over-HTTP transport binding.
 *
 *   POST /events   InboundEvent → { ok: true, actions }
 *   GET  /health   liveness
 */

export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

export interface HttpServerOptions {
  maxBodyBytes?: number;
}

class RequestBodyError extends Error {
  constructor(
    message: string,
    readonly status: 400 | 413,
  ) {
    super(message);
    this.name = 'RequestBodyError';
  }
}

export function createHttpServer(
  engine: MarketplaceEngine,
  options: HttpServerOptions = {},
): ReturnType<typeof createServer> {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  return createServer(async (req, res) => {
    try {
      if (!req.url || !req.method) {
        writeJson(res, 400, { ok: false, error: 'Missing request URL/method' });
        return;
      }

      const path = new URL(req.url, `http://${req.headers.host ?? 'localhost'}`).pathname;

      if (req.method === 'GET' && path === '/health') {
        writeJson(res, 200, { ok: true, kinds: engine.registry.kinds().length });
        return;
      }

      if (req.method === 'POST' && path === '/events') {
        const body = await readJsonBody(req, maxBodyBytes);
        const event = parseInboundEvent(body);
        if (!event.ok) {
          writeJson(res, 400, { ok: false, error: event.error });
          return;
        }

        const actions = await engine.handle(event.value);
        writeJson(res, 200, { ok: true, actions });
        return;
      }

      writeJson(res, 404, { ok: false, error: 'Not found' });
    } catch (err) {
      if (err instanceof RequestBodyError) {
        writeJson(res, err.status, { ok: false, error: err.message });
        return;
      }
      logger.error({ err, method: req.method, url: req.url }, 'HTTP request failed');
      if (!res.headersSent) {
        writeJson(res, 500, { ok: false, error: 'Internal server error' });
      }
    }
  });
}

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total > maxBytes) {
      throw new RequestBodyError(`Request body too large (max ${maxBytes} bytes)`, 413);
    }
    chunks.push(buf);
  }

  const raw = Buffer.concat(chunks).toString('utf-8').trim();
  if (!raw) throw new RequestBodyError('Empty request body', 400);

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new RequestBodyError('Invalid JSON body', 400);
  }
}

function writeJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader('content-type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(body));
}
