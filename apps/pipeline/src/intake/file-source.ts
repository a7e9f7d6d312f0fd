/**
 * FILE PURPOSE: Bulk record files as a paged RecordSource
 *
 * WHY: Bulk reprocessing reads millions of records from a file; only the
 *      page being processed may be held in memory.
 * HOW: .jsonl and .csv files are streamed (readline / Papa Parse stream
 *      mode); a .json file holds one array and is read whole. Records are
 *      passed on raw, the orchestrator validates each of them.
 */

import { createReadStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { createInterface } from 'node:readline';
import { ValidationError } from '@boost-pipeline/boost-core';
import type { RecordSource } from '@boost-pipeline/boost-core';

export type SourceFormat = 'json' | 'jsonl' | 'csv';

const FORMATS: Record<string, SourceFormat> = {
  '.json': 'json',
  '.jsonl': 'jsonl',
  '.ndjson': 'jsonl',
  '.csv': 'csv',
};

export function detectFormat(filePath: string): SourceFormat {
  const format = FORMATS[extname(filePath).toLowerCase()];
  if (!format) {
    throw new ValidationError(`Unsupported input file ${filePath}: expected .json, .jsonl or .csv`);
  }
  return format;
}

/** Group an async stream of records into arrays of at most `pageSize`. */
export async function* paginate<T>(records: AsyncIterable<T>, pageSize: number): AsyncGenerator<T[]> {
  let page: T[] = [];
  for await (const record of records) {
    page.push(record);
    if (page.length >= pageSize) {
      yield page;
      page = [];
    }
  }
  if (page.length > 0) yield page;
}

async function* jsonLines(filePath: string): AsyncGenerator<string> {
  const lines = createInterface({ input: createReadStream(filePath, 'utf-8'), crlfDelay: Infinity });
  for await (const line of lines) {
    if (line.trim() !== '') yield line;
  }
}

async function* jsonArray(filePath: string): AsyncGenerator<unknown> {
  const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new ValidationError(`${filePath} must contain a JSON array of records`);
  }
  yield* parsed;
}

async function* csvRows(filePath: string): AsyncGenerator<unknown> {
  const Papa = await import('papaparse');
  const parse = Papa.default?.parse ?? Papa.parse;
  const streamInput: typeof Papa.NODE_STREAM_INPUT = Papa.default?.NODE_STREAM_INPUT ?? Papa.NODE_STREAM_INPUT;
  const rows: AsyncIterable<unknown> = createReadStream(filePath, 'utf-8').pipe(
    parse(streamInput, { header: true, skipEmptyLines: true }),
  );
  for await (const row of rows) {
    yield row;
  }
}

export class FileRecordSource implements RecordSource {
  readonly format: SourceFormat;

  constructor(private readonly filePath: string, format?: SourceFormat) {
    this.format = format ?? detectFormat(filePath);
  }

  pages(pageSize: number): AsyncIterable<unknown[]> {
    return paginate(this.records(), pageSize);
  }

  private records(): AsyncIterable<unknown> {
    switch (this.format) {
      case 'jsonl':
        return jsonLines(this.filePath);
      case 'csv':
        return csvRows(this.filePath);
      case 'json':
        return jsonArray(this.filePath);
    }
  }
}
