/**
 * Tests for the boost HTTP routes (routes/boost-factors.ts, routes/boost-requests.ts)
 *
 * Uses the in-memory store and a recording intake queue; no server is bound.
 */

import { describe, it, expect, vi } from 'vitest';
import type { IncomingMessage } from 'node:http';
import type { IntakeJobData } from '@boost-pipeline/boost-core';
import { handleBoostFactorRoutes } from '../src/routes/boost-factors.js';
import { INTAKE_JOB_NAME, handleBoostRequestRoutes } from '../src/routes/boost-requests.js';
import { InMemoryBoostFactorsStore, createMockReq, createMockRes, makeFactors } from './helpers.js';

function createBodyParser(body: Record<string, unknown>): (req: IncomingMessage) => Promise<Record<string, unknown>> {
  return () => Promise.resolve(body);
}

function recordingQueue() {
  const added: Array<{ name: string; data: IntakeJobData }> = [];
  return {
    added,
    add: vi.fn(async (name: string, data: IntakeJobData) => {
      added.push({ name, data });
      return {};
    }),
  };
}

describe('handleBoostFactorRoutes', () => {
  it('returns the stored factors by bibcode', async () => {
    const store = new InMemoryBoostFactorsStore();
    await store.upsert(makeFactors());
    const res = createMockRes();

    await handleBoostFactorRoutes(createMockReq('GET'), res, '/api/boost-factors/2024TEST..001..001A', store);

    expect(res._statusCode).toBe(200);
    const body = JSON.parse(res._body);
    expect(body.bibcode).toBe('2024TEST..001..001A');
    expect(body.scix_id).toBe('scix:0001-TEST');
    expect(body.boost_factor).toBe(0.9);
  });

  it('finds a record by its URL-encoded scix_id', async () => {
    const store = new InMemoryBoostFactorsStore();
    await store.upsert(makeFactors({ bibcode: '' }));
    const res = createMockRes();

    await handleBoostFactorRoutes(createMockReq('GET'), res, '/api/boost-factors/scix%3A0001-TEST', store);

    expect(res._statusCode).toBe(200);
    expect(JSON.parse(res._body).scix_id).toBe('scix:0001-TEST');
  });

  it('returns 404 for an unknown id', async () => {
    const res = createMockRes();
    await handleBoostFactorRoutes(createMockReq('GET'), res, '/api/boost-factors/UNKNOWN', new InMemoryBoostFactorsStore());

    expect(res._statusCode).toBe(404);
    expect(JSON.parse(res._body)).toEqual({ error: 'No boost factors for UNKNOWN' });
  });

  it('returns 400 for an id with a malformed escape', async () => {
    const store = new InMemoryBoostFactorsStore();
    const getSpy = vi.spyOn(store, 'get');
    const res = createMockRes();

    await handleBoostFactorRoutes(createMockReq('GET'), res, '/api/boost-factors/%E0', store);

    expect(res._statusCode).toBe(400);
    expect(JSON.parse(res._body)).toEqual({ error: 'Malformed id encoding' });
    expect(getSpy).not.toHaveBeenCalled();
  });

  it('returns 405 for other methods', async () => {
    const res = createMockRes();
    await handleBoostFactorRoutes(createMockReq('DELETE'), res, '/api/boost-factors/A', new InMemoryBoostFactorsStore());
    expect(res._statusCode).toBe(405);
  });

  it('returns 500 when the store fails', async () => {
    const store = new InMemoryBoostFactorsStore();
    vi.spyOn(store, 'get').mockRejectedValue(new Error('connection reset'));
    const res = createMockRes();

    await handleBoostFactorRoutes(createMockReq('GET'), res, '/api/boost-factors/A', store);

    expect(res._statusCode).toBe(500);
    expect(JSON.parse(res._body)).toEqual({ error: 'Internal server error' });
  });
});

describe('handleBoostRequestRoutes', () => {
  it('queues a single valid message', async () => {
    const queue = recordingQueue();
    const res = createMockRes();
    const message = { bibcode: '2024TEST..001..001A', bib_data: { doctype: 'article' } };

    await handleBoostRequestRoutes(createMockReq('POST'), res, '/api/boost-requests', createBodyParser(message), queue);

    expect(res._statusCode).toBe(202);
    expect(JSON.parse(res._body)).toEqual({ accepted: ['2024TEST..001..001A'], rejected: [] });
    expect(queue.added).toHaveLength(1);
    expect(queue.added[0]?.name).toBe(INTAKE_JOB_NAME);
    expect(queue.added[0]?.data.message).toEqual(message);
  });

  it('reports invalid messages by position and queues the rest', async () => {
    const queue = recordingQueue();
    const res = createMockRes();
    const body = { messages: [{ bibcode: 'A' }, { doctype: 'article' }, 'not json', { scix_id: 'scix:B' }] };

    await handleBoostRequestRoutes(createMockReq('POST'), res, '/api/boost-requests', createBodyParser(body), queue);

    expect(res._statusCode).toBe(202);
    const parsed = JSON.parse(res._body);
    expect(parsed.accepted).toEqual(['A', 'scix:B']);
    expect(parsed.rejected).toEqual([
      { index: 1, error: 'Boost request has neither bibcode nor scix_id' },
      { index: 2, error: 'Boost request is not valid JSON' },
    ]);
    expect(queue.add).toHaveBeenCalledTimes(2);
  });

  it('returns 400 for an empty body', async () => {
    const queue = recordingQueue();
    const res = createMockRes();

    await handleBoostRequestRoutes(createMockReq('POST'), res, '/api/boost-requests', createBodyParser({}), queue);

    expect(res._statusCode).toBe(400);
    expect(queue.add).not.toHaveBeenCalled();
  });

  it('returns 500 when the intake queue is down', async () => {
    const queue = { add: vi.fn().mockRejectedValue(new Error('Connection is closed.')) };
    const res = createMockRes();

    await handleBoostRequestRoutes(createMockReq('POST'), res, '/api/boost-requests', createBodyParser({ bibcode: 'A' }), queue);

    expect(res._statusCode).toBe(500);
  });

  it('returns 405 for GET', async () => {
    const res = createMockRes();
    await handleBoostRequestRoutes(createMockReq('GET'), res, '/api/boost-requests', createBodyParser({}), recordingQueue());
    expect(res._statusCode).toBe(405);
  });
});
