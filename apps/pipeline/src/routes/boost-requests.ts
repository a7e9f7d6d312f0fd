/**
 * FILE PURPOSE: HTTP intake for upstream boost requests
 *
 * WHY: Upstream systems without direct queue access post their messages here.
 *      Valid messages are queued on the intake channel; invalid ones are
 *      reported back by position instead of failing the whole request.
 *
 * Routes:
 *   POST /api/boost-requests   body: one message, or { messages: [...] }
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { ValidationError, errorMessage, parseBoostRequest, recordLabel } from '@boost-pipeline/boost-core';
import type { IntakeJobData } from '@boost-pipeline/boost-core';
import type { BodyParser } from '../types.js';
import { handleRouteError, sendJson } from '../types.js';

export const INTAKE_JOB_NAME = 'boost-request';

/** The part of the intake Queue the route needs. */
export interface IntakeQueue {
  add(name: string, data: IntakeJobData): Promise<unknown>;
}

export interface RejectedMessage {
  index: number;
  error: string;
}

function messagesOf(body: Record<string, unknown>): unknown[] {
  if ('messages' in body) {
    return Array.isArray(body.messages) ? body.messages : [];
  }
  return Object.keys(body).length > 0 ? [body] : [];
}

export async function handleBoostRequestRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  parseBody: BodyParser,
  intakeQueue: IntakeQueue,
): Promise<void> {
  try {
    const { pathname } = new URL(url, 'http://localhost');
    if (pathname !== '/api/boost-requests') {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }
    if (req.method !== 'POST') {
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    const messages = messagesOf(await parseBody(req));
    if (messages.length === 0) {
      sendJson(res, 400, { error: 'Body must be a boost request or { messages: [...] } with at least one entry' });
      return;
    }

    const receivedAt = new Date().toISOString();
    const accepted: string[] = [];
    const rejected: RejectedMessage[] = [];
    for (const [index, message] of messages.entries()) {
      try {
        // Validated here so the caller hears about bad messages synchronously.
        const request = parseBoostRequest(message);
        await intakeQueue.add(INTAKE_JOB_NAME, { message, receivedAt });
        accepted.push(recordLabel(request));
      } catch (err) {
        if (err instanceof ValidationError) {
          rejected.push({ index, error: errorMessage(err) });
          continue;
        }
        throw err;
      }
    }

    sendJson(res, 202, { accepted, rejected });
  } catch (err) {
    handleRouteError(res, 'boost-requests', err);
  }
}
