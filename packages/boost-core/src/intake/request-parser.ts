/**
 * FILE PURPOSE: Inbound upstream message → BoostRequest
 *
 * WHY: The upstream system sends loosely-shaped JSON: nested sections that may
 *      themselves be JSON strings, collection tags in several places, partial
 *      dates. The core only ever sees a clean, validated BoostRequest.
 * HOW: zod checks the structural shape, small normalisers pick the fields the
 *      core consumes, everything else is ignored. A message with no usable
 *      identifier is a ValidationError.
 *
 * Accepts both the nested upstream shape:
 *   { bibcode, scix_id, bib_data: { doctype, pubdate, entry_date, database },
 *     metrics: { refereed }, classifications: [...] }
 * and flat rows (CSV intake): { bibcode, scix_id, doctype, pubdate, refereed, collections }.
 */

import { z } from 'zod';
import type { BoostRequest } from '@boost-pipeline/shared-types';
import { ValidationError } from '../errors.js';

export interface ParseOptions {
  /** Non-fatal oddities (unparseable embedded section, bad date). */
  onWarning?: (message: string) => void;
}

const sectionSchema = z.union([z.string(), z.record(z.string(), z.unknown())]).nullish();
const identifierSchema = z.union([z.string(), z.number()]).nullish();

const inboundMessageSchema = z
  .object({
    bibcode: identifierSchema,
    scix_id: identifierSchema,
    bib_data: sectionSchema,
    metrics: sectionSchema,
    classifications: z.unknown(),
    collections: z.unknown(),
    database: z.unknown(),
    doctype: z.string().nullish(),
    pubdate: z.string().nullish(),
    entry_date: z.string().nullish(),
    refereed: z.union([z.boolean(), z.string(), z.number()]).nullish(),
  })
  .passthrough();

type Section = Record<string, unknown>;

function parseSection(value: string | Section | null | undefined, name: string, options: ParseOptions): Section {
  if (value === null || value === undefined) return {};
  if (typeof value !== 'string') return value;
  if (value.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(value);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    options.onWarning?.(`${name} is not a JSON object, ignoring it`);
  } catch {
    options.onWarning?.(`Failed to parse ${name} JSON, ignoring it`);
  }
  return {};
}

function asIdentifier(value: string | number | null | undefined): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

function isTruthyFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return ['true', '1', 'yes', 'y'].includes(value.trim().toLowerCase());
  return false;
}

/**
 * Normalise an upstream date (YYYY, YYYY-MM, YYYY-MM-DD or an ISO timestamp)
 * to YYYY-MM-DD. A "00" month or day is read as "01".
 */
export function normalizeDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const match = /^(\d{4})(?:-(\d{2}))?(?:-(\d{2}))?/.exec(value.trim());
  if (!match) return null;

  const year = match[1] ?? '';
  const month = !match[2] || match[2] === '00' ? '01' : match[2];
  const day = !match[3] || match[3] === '00' ? '01' : match[3];
  const iso = `${year}-${month}-${day}`;

  const parsed = new Date(`${iso}T00:00:00Z`);
  // Rejects 2024-13-01 and rolled-over dates such as 2024-02-31.
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== iso) return null;
  return iso;
}

/** The earlier of publication and entry date. */
function resolvePublicationDate(pubdate: unknown, entryDate: unknown, options: ParseOptions): string | null {
  const candidates = [normalizeDate(pubdate), normalizeDate(entryDate)].filter(
    (d): d is string => d !== null,
  );
  if (candidates.length === 0) {
    if (pubdate || entryDate) options.onWarning?.('Unparseable publication date, treating record as undated');
    return null;
  }
  return candidates.sort()[0] ?? null;
}

function toTagList(value: unknown): string[] {
  if (typeof value === 'string') return value.split(/[;,|]/);
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return [];
}

function extractCollections(message: Section, bibData: Section): string[] {
  const { classifications } = message;
  let raw: string[] = [];

  if (classifications && typeof classifications === 'object' && !Array.isArray(classifications)) {
    const nested = Object.fromEntries(Object.entries(classifications));
    raw = toTagList(nested.database ?? nested.collections);
  } else {
    raw = toTagList(classifications);
  }
  if (raw.length === 0) raw = toTagList(message.collections);
  if (raw.length === 0) raw = toTagList(bibData.database);
  if (raw.length === 0) raw = toTagList(message.database);

  const tags = raw
    .map((tag) => tag.trim().toLowerCase().replace(/\s+/g, '_'))
    .filter((tag) => tag.length > 0);
  return [...new Set(tags)];
}

/**
 * Parse one inbound message (JSON string or object) into a BoostRequest.
 *
 * @throws ValidationError for non-object input, invalid JSON, wrong field
 *         types, or a message with neither bibcode nor scix_id
 */
export function parseBoostRequest(input: unknown, options: ParseOptions = {}): BoostRequest {
  let candidate: unknown = input;
  if (typeof input === 'string') {
    try {
      candidate = JSON.parse(input);
    } catch (err) {
      throw new ValidationError('Boost request is not valid JSON', { cause: err });
    }
  }
  if (!candidate || typeof candidate !== 'object' || Array.isArray(candidate)) {
    throw new ValidationError(`Boost request must be a JSON object, got ${Array.isArray(candidate) ? 'array' : typeof candidate}`);
  }

  const parsed = inboundMessageSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Malformed boost request: ${issues}`);
  }
  const message = parsed.data;

  const bibcode = asIdentifier(message.bibcode);
  const scixId = asIdentifier(message.scix_id);
  if (!bibcode && !scixId) {
    throw new ValidationError('Boost request has neither bibcode nor scix_id');
  }

  const bibData = parseSection(message.bib_data, 'bib_data', options);
  const metrics = parseSection(message.metrics, 'metrics', options);

  const isRefereed = isTruthyFlag(metrics.refereed) || isTruthyFlag(bibData.refereed) || isTruthyFlag(message.refereed);
  const rawDoctype = bibData.doctype ?? message.doctype;
  const docType = typeof rawDoctype === 'string' ? rawDoctype.trim().toLowerCase() : '';

  return {
    bibcode,
    scixId,
    isRefereed,
    docType,
    publicationDate: resolvePublicationDate(
      bibData.pubdate ?? message.pubdate,
      bibData.entry_date ?? message.entry_date,
      options,
    ),
    collections: extractCollections(message, bibData),
  };
}
