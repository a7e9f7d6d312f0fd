/**
 * FILE PURPOSE: Shared types and error handling for API route handlers
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { errorMessage, log } from '@boost-pipeline/boost-core';

export type BodyParser = (req: IncomingMessage) => Promise<Record<string, unknown>>;

export function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.end(JSON.stringify(body));
}

export function handleRouteError(res: ServerResponse, routeName: string, err: unknown): void {
  log.error(`in ${routeName} routes: ${errorMessage(err)}`);
  if (!res.writableEnded) {
    sendJson(res, 500, { error: 'Internal server error' });
  }
}
