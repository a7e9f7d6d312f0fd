/**
 * FILE PURPOSE: Request handler for the boost pipeline HTTP API
 *
 * WHY: Kept apart from server.ts so the routing can be exercised with mock
 *      requests, without binding a port.
 * HOW: Native Node.js HTTP, zero framework deps. Health check first, then
 *      prefix routing onto the route modules. CORS origin restriction via
 *      ALLOWED_ORIGINS.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { errorMessage, log } from '@boost-pipeline/boost-core';
import { handleBoostFactorRoutes } from './routes/boost-factors.js';
import { handleBoostRequestRoutes } from './routes/boost-requests.js';
import type { IntakeQueue } from './routes/boost-requests.js';
import type { BoostFactorsStore } from './services/boost-persistence.js';
import type { BodyParser } from './types.js';
import { sendJson } from './types.js';

export interface ApiDeps {
  store: BoostFactorsStore;
  intakeQueue: IntakeQueue;
  /** Resolves when the database answers, rejects otherwise. */
  pingDatabase: () => Promise<void>;
  allowedOrigins?: ReadonlySet<string> | null;
  startTime?: number;
  parseBody?: BodyParser;
}

/** Parse allowed origins from a comma-separated list. */
export function parseAllowedOrigins(raw: string | undefined): Set<string> | null {
  if (!raw) return null;
  return new Set(raw.split(',').map((o) => o.trim()).filter(Boolean));
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a JSON object body. Arrays are wrapped as { messages }; anything else yields {}. */
export function parseBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString());
        if (Array.isArray(parsed)) resolve({ messages: parsed });
        else resolve(isJsonObject(parsed) ? parsed : {});
      } catch {
        resolve({});
      }
    });
    req.on('error', (err) => {
      log.warn(`Request body read failed: ${err.message}`);
      resolve({});
    });
  });
}

export function createRequestHandler(deps: ApiDeps): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const startTime = deps.startTime ?? Date.now();
  const allowedOrigins = deps.allowedOrigins ?? null;
  const bodyParser = deps.parseBody ?? parseBody;

  return async (req, res) => {
    res.setHeader('Content-Type', 'application/json');

    // ─── CORS with origin restriction ───
    const requestOrigin = req.headers.origin;
    if (allowedOrigins && requestOrigin) {
      if (allowedOrigins.has(requestOrigin)) {
        res.setHeader('Access-Control-Allow-Origin', requestOrigin);
      }
    } else {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    const url = req.url ?? '';

    // ─── Health check ───
    if (url === '/api/health') {
      const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);
      let dbStatus: 'ok' | 'unreachable' = 'ok';
      try {
        await deps.pingDatabase();
      } catch (err) {
        log.warn(`Health check: database unreachable: ${errorMessage(err)}`);
        dbStatus = 'unreachable';
      }

      sendJson(res, dbStatus === 'ok' ? 200 : 503, {
        status: dbStatus === 'ok' ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        uptimeSeconds,
        services: { database: dbStatus },
      });
      return;
    }

    if (url.startsWith('/api/boost-factors')) {
      await handleBoostFactorRoutes(req, res, url, deps.store);
      return;
    }

    if (url.startsWith('/api/boost-requests')) {
      await handleBoostRequestRoutes(req, res, url, bodyParser, deps.intakeQueue);
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  };
}
