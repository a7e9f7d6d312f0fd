/**
 * Shared test helpers for the pipeline app: mock HTTP objects, record
 * builders and in-memory stand-ins for the store and the notifier.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { BoostFactors, BoostRequest, RecordKey } from '@boost-pipeline/shared-types';
import type { BoostFactorsPage, BoostFactorsStore } from '../src/services/boost-persistence.js';
import type { BoostNotifier } from '../src/services/boost-notifier.js';

export function createMockReq(method: string, url = '', headers: Record<string, string> = {}): IncomingMessage {
  return { method, url, headers } as IncomingMessage;
}

export type MockRes = ServerResponse & { _body: string; _statusCode: number; _headers: Record<string, string> };

type MockResState = { statusCode: number; writableEnded: boolean; _body: string; _statusCode: number; _headers: Record<string, string> };

export function createMockRes(): MockRes {
  const res = {
    statusCode: 200,
    writableEnded: false,
    _body: '',
    _statusCode: 200,
    _headers: {} as Record<string, string>,
    setHeader(this: MockResState, name: string, value: string) {
      this._headers[name.toLowerCase()] = value;
      return this;
    },
    end(this: MockResState, body?: string) {
      this._body = body ?? '';
      this._statusCode = this.statusCode;
      this.writableEnded = true;
    },
  } as unknown as MockRes;
  return res;
}

const zeroScores = {
  astronomy: 0,
  physics: 0,
  earth_science: 0,
  planetary_science: 0,
  heliophysics: 0,
  general: 0,
};

export function makeRequest(overrides: Partial<BoostRequest> = {}): BoostRequest {
  return {
    bibcode: '2024TEST..001..001A',
    scixId: 'scix:0001-TEST',
    isRefereed: true,
    docType: 'article',
    publicationDate: '2024-03-01',
    collections: ['astronomy'],
    ...overrides,
  };
}

export function makeFactors(overrides: Partial<BoostFactors> = {}): BoostFactors {
  return {
    bibcode: '2024TEST..001..001A',
    scixId: 'scix:0001-TEST',
    refereedBoost: 1,
    doctypeBoost: 0.8,
    recencyBoost: 1,
    combinedBoost: 0.9,
    weights: { ...zeroScores, astronomy: 1 },
    finalBoosts: { ...zeroScores, astronomy: 0.9 },
    createdAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

/** Keyed on (bibcode, scixId) like the table's unique constraint. */
export class InMemoryBoostFactorsStore implements BoostFactorsStore {
  readonly rows = new Map<string, { id: number; factors: BoostFactors }>();
  upserts = 0;
  private nextId = 1;

  async upsert(factors: BoostFactors): Promise<void> {
    this.upserts += 1;
    const key = `${factors.bibcode}\u0000${factors.scixId}`;
    const existing = this.rows.get(key);
    this.rows.set(key, { id: existing?.id ?? this.nextId++, factors: structuredClone(factors) });
  }

  async get(key: RecordKey): Promise<BoostFactors | null> {
    const all = [...this.rows.values()].map((row) => row.factors);
    const byBibcode = key.bibcode ? all.find((f) => f.bibcode === key.bibcode) : undefined;
    const byScixId = key.scixId ? all.find((f) => f.scixId === key.scixId) : undefined;
    return byBibcode ?? byScixId ?? null;
  }

  async listPage(cursor: number, limit: number): Promise<BoostFactorsPage> {
    const rows = [...this.rows.values()].filter((row) => row.id > cursor).sort((a, b) => a.id - b.id).slice(0, limit);
    const last = rows.at(-1);
    return {
      items: rows.map((row) => row.factors),
      nextCursor: last && rows.length === limit ? last.id : null,
    };
  }
}

export class RecordingNotifier implements BoostNotifier {
  readonly sent: BoostFactors[] = [];
  closed = false;

  async send(factors: BoostFactors): Promise<void> {
    this.sent.push(factors);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
