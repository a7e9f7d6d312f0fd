/**
 * FILE PURPOSE: Read access to stored boost factors
 *
 * Routes:
 *   GET /api/boost-factors/:id   (id is a bibcode or a scix_id)
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { toBoostResponseMessage } from '@boost-pipeline/boost-core';
import type { BoostFactorsStore } from '../services/boost-persistence.js';
import { handleRouteError, sendJson } from '../types.js';

export async function handleBoostFactorRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  store: BoostFactorsStore,
): Promise<void> {
  try {
    const parsedUrl = new URL(url, 'http://localhost');
    const idMatch = parsedUrl.pathname.match(/^\/api\/boost-factors\/([^/]+)$/);
    if (!idMatch?.[1]) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }
    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    let id: string;
    try {
      id = decodeURIComponent(idMatch[1]).trim();
    } catch (err) {
      if (!(err instanceof URIError)) throw err;
      sendJson(res, 400, { error: 'Malformed id encoding' });
      return;
    }
    const factors = await store.get({ bibcode: id, scixId: id });
    if (!factors) {
      sendJson(res, 404, { error: `No boost factors for ${id}` });
      return;
    }
    sendJson(res, 200, toBoostResponseMessage(factors));
  } catch (err) {
    handleRouteError(res, 'boost-factors', err);
  }
}
