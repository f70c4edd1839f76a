import { isRecord, type OpenDataRawEvent } from '../models/event';
import { fetchJson, DEFAULT_TIMEOUT_MS } from './http';
import type { FetchFn, SourceConnector } from './types';

export const OPEN_DATA_SOURCE_NAME = 'open_data_api';
export const DEFAULT_OPEN_DATA_BASE_URL = 'https://data.cityofnewyork.us/resource';
const DEFAULT_PAGE_SIZE = 200;

export interface OpenDataConnectorConfig {
  datasetId: string;
  appToken: string;
  baseUrl?: string;
  pageSize?: number;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

/**
 * Pages through a Socrata-style dataset with $limit/$offset until the API
 * returns an empty page.
 */
export class OpenDataConnector implements SourceConnector<OpenDataRawEvent> {
  readonly sourceName = OPEN_DATA_SOURCE_NAME;
  private readonly baseUrl: string;
  private readonly datasetId: string;
  private readonly appToken: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: FetchFn;

  constructor(config: OpenDataConnectorConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_OPEN_DATA_BASE_URL).replace(/\/+$/, '');
    this.datasetId = config.datasetId;
    this.appToken = config.appToken;
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl;
  }

  get sourceUrl(): string {
    return `${this.baseUrl}/${this.datasetId}.json`;
  }

  async fetchRawEvents(): Promise<OpenDataRawEvent[]> {
    const results: OpenDataRawEvent[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.fetchPage(offset);
      if (page.length === 0) {
        break;
      }
      for (const row of page) {
        const mapped = toOpenDataRawEvent(row);
        if (mapped) {
          results.push(mapped);
        }
      }
      offset += this.pageSize;
    }

    return results;
  }

  private async fetchPage(offset: number): Promise<unknown[]> {
    const search = new URLSearchParams({
      $limit: String(this.pageSize),
      $offset: String(offset),
    });
    const payload = await fetchJson(`${this.sourceUrl}?${search.toString()}`, {
      headers: { 'X-App-Token': this.appToken },
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });
    return Array.isArray(payload) ? payload : [];
  }
}

const TEXT_COLUMNS: Array<[Exclude<keyof OpenDataRawEvent, 'kind' | 'free'>, string]> = [
  ['eventName', 'event_name'],
  ['title', 'title'],
  ['description', 'description'],
  ['shortDescription', 'short_description'],
  ['startDateTime', 'start_date_time'],
  ['endDateTime', 'end_date_time'],
  ['location', 'location'],
  ['eventLocation', 'event_location'],
  ['price', 'price'],
  ['eventUrl', 'event_url'],
  ['url', 'url'],
  ['eventId', 'event_id'],
  ['rowId', ':id'],
];

export function toOpenDataRawEvent(row: unknown): OpenDataRawEvent | null {
  if (!isRecord(row)) {
    return null;
  }

  const event: OpenDataRawEvent = { kind: 'api' };
  for (const [field, column] of TEXT_COLUMNS) {
    const text = readText(row[column]);
    if (text !== undefined) {
      event[field] = text;
    }
  }

  const free = readFlag(row.free);
  if (free !== undefined) {
    event.free = free;
  }

  return event;
}

function readText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function readFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return ['true', '1', 'yes', 'y'].includes(value.trim().toLowerCase());
  }
  return undefined;
}
