/**
 * Capture Parser - turns a HAR capture log into RawExchange records
 *
 * The container is validated up front (MalformedCapture otherwise). Entries
 * are decoded one at a time while iterating; an entry that cannot be decoded
 * is skipped and recorded as a PartialParseWarning.
 */

import { readFile } from 'node:fs/promises';
import type { CapturedBody, Diagnostic, RawExchange } from '../types/index.js';
import { MalformedCaptureError } from '../core/errors.js';
import { type Logger, silentLogger } from '../core/logger.js';
import { createRecord, ownValue } from '../core/records.js';
import {
  harContainerSchema,
  harEntrySchema,
  type HarContent,
  type HarEntry,
  type HarHeader,
  type HarPostData,
} from './har.types.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/\-_\s]*={0,2}\s*$/;

class EntryDecodeError extends Error {}

export class CaptureStream implements Iterable<RawExchange> {
  readonly source: string;
  readonly entryCount: number;
  private entries: readonly unknown[];
  private logger: Logger;
  private issues: Diagnostic[] = [];

  constructor(source: string, entries: readonly unknown[], logger: Logger) {
    this.source = source;
    this.entries = entries;
    this.entryCount = entries.length;
    this.logger = logger;
  }

  /**
   * Diagnostics of the latest iteration
   */
  get diagnostics(): readonly Diagnostic[] {
    return this.issues;
  }

  *[Symbol.iterator](): Iterator<RawExchange> {
    this.issues = [];

    for (let index = 0; index < this.entries.length; index++) {
      let exchange: RawExchange;
      try {
        exchange = decodeEntry(this.entries[index], index);
      } catch (error) {
        if (!(error instanceof EntryDecodeError)) {
          throw error;
        }
        this.issues.push({ kind: 'PartialParseWarning', entryIndex: index, message: error.message });
        this.logger.warn({ source: this.source, entryIndex: index, reason: error.message }, 'skipped capture entry');
        continue;
      }
      yield exchange;
    }
  }
}

export class CaptureParser {
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger.child({ component: 'capture-parser' });
  }

  /**
   * Read a capture file. Each call re-reads the file.
   */
  async open(filePath: string): Promise<CaptureStream> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf-8');
    } catch (error) {
      const reason = (error as NodeJS.ErrnoException).code === 'ENOENT'
        ? 'file not found'
        : error instanceof Error ? error.message : String(error);
      throw new MalformedCaptureError(filePath, reason);
    }
    return this.fromText(text, filePath);
  }

  fromText(text: string, source: string = '<memory>'): CaptureStream {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new MalformedCaptureError(
        source,
        `not valid JSON (${error instanceof Error ? error.message : String(error)})`
      );
    }
    return this.fromObject(parsed, source);
  }

  fromObject(value: unknown, source: string = '<memory>'): CaptureStream {
    const container = harContainerSchema.safeParse(value);
    if (!container.success) {
      throw new MalformedCaptureError(source, 'expected an archive with log.entries');
    }

    const entries = container.data.log.entries;
    this.logger.debug({ source, entries: entries.length }, 'capture opened');
    return new CaptureStream(source, entries, this.logger);
  }
}

/**
 * Decode one HAR entry. Throws EntryDecodeError for entries to skip.
 */
function decodeEntry(raw: unknown, index: number): RawExchange {
  const result = harEntrySchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'entry';
    throw new EntryDecodeError(`${where}: ${issue.message}`);
  }
  const entry: HarEntry = result.data;

  let url: URL;
  try {
    url = new URL(entry.request.url);
  } catch {
    throw new EntryDecodeError(`unparsable URL: ${entry.request.url}`);
  }

  const requestHeaders = headerRecord(entry.request.headers);
  const responseHeaders = headerRecord(entry.response.headers);

  const requestBody = decodePostData(entry.request.postData, requestHeaders['content-type']);
  const responseBody = decodeContent(entry.response.content, responseHeaders['content-type']);

  const started = entry.startedDateTime ? Date.parse(entry.startedDateTime) : NaN;

  const exchange: RawExchange = {
    index,
    method: entry.request.method.toUpperCase(),
    url: entry.request.url,
    scheme: url.protocol.replace(/:$/, ''),
    host: url.hostname.toLowerCase(),
    ...(url.port ? { port: Number(url.port) } : {}),
    path: url.pathname || '/',
    query: Object.freeze(queryRecord(entry, url)),
    requestHeaders: Object.freeze(requestHeaders),
    responseHeaders: Object.freeze(responseHeaders),
    status: entry.response.status,
    ...(requestBody ? { requestBody } : {}),
    ...(responseBody ? { responseBody } : {}),
    timestamp: Number.isNaN(started) ? 0 : started,
    durationMs: entry.time ?? 0,
  };

  return Object.freeze(exchange);
}

/**
 * Lower-case header names, drop HTTP/2 pseudo headers, join repeats
 */
function headerRecord(headers: HarHeader[]): Record<string, string> {
  const record = createRecord<string>();
  for (const { name, value } of headers) {
    if (name.startsWith(':')) continue;
    const key = name.toLowerCase();
    const existing = ownValue(record, key);
    record[key] = existing === undefined ? value : `${existing}, ${value}`;
  }
  return record;
}

function queryRecord(entry: HarEntry, url: URL): Record<string, string | string[]> {
  const pairs: Array<[string, string]> =
    entry.request.queryString && entry.request.queryString.length > 0
      ? entry.request.queryString.map((q) => [q.name, q.value])
      : Array.from(url.searchParams.entries());

  const record = createRecord<string | string[]>();
  for (const [name, value] of pairs) {
    const existing = ownValue(record, name);
    if (existing === undefined) {
      record[name] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      record[name] = [existing, value];
    }
  }
  return record;
}

function decodePostData(postData: HarPostData | undefined, headerType: string | undefined): CapturedBody | undefined {
  if (!postData) return undefined;

  const mimeType = postData.mimeType || headerType || '';
  const params = postData.params?.map((p) => ({ name: p.name, value: p.value ?? '' }));

  if (postData.text === undefined || postData.text === '') {
    if (params && params.length > 0) {
      return Object.freeze({ mimeType, raw: Buffer.alloc(0), text: '', params });
    }
    return undefined;
  }

  const raw = decodeText(postData.text, postData.encoding);
  return Object.freeze({
    mimeType,
    raw,
    text: raw.toString('utf-8'),
    ...(params && params.length > 0 ? { params } : {}),
  });
}

function decodeContent(content: HarContent | undefined, headerType: string | undefined): CapturedBody | undefined {
  if (!content || content.text === undefined || content.text === '') return undefined;

  const raw = decodeText(content.text, content.encoding);
  return Object.freeze({
    mimeType: content.mimeType || headerType || '',
    raw,
    text: raw.toString('utf-8'),
  });
}

function decodeText(text: string, encoding: string | undefined): Buffer {
  if (encoding === undefined || encoding === '' || encoding.toLowerCase() === 'utf-8' || encoding.toLowerCase() === 'utf8') {
    return Buffer.from(text, 'utf-8');
  }
  if (encoding.toLowerCase() === 'base64') {
    if (!BASE64_PATTERN.test(text)) {
      throw new EntryDecodeError('undecodable base64 body');
    }
    return Buffer.from(text, 'base64');
  }
  throw new EntryDecodeError(`unsupported body encoding: ${encoding}`);
}
