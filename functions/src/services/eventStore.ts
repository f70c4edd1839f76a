import { createHash } from 'crypto';
import {
  FieldPath,
  Timestamp,
  type DocumentData,
  type Firestore,
  type QueryDocumentSnapshot,
  type QuerySnapshot,
} from 'firebase-admin/firestore';
import {
  isEventSourceKind,
  readRawEventPayload,
  type EventInput,
  type EventRecord,
  type EventSourceKind,
} from '../models/event';

export const EVENTS_COLLECTION = 'events';
export const COUNTERS_COLLECTION = 'counters';
export const EVENTS_COUNTER_DOC = 'events';
export const MAX_EVENT_LIST_LIMIT = 500;
const IN_QUERY_CHUNK_SIZE = 30;
const SCAN_PAGE_SIZE = 500;

export interface EventFilter {
  query?: string | null;
  dateStart?: string | null;
  dateEnd?: string | null;
  priceMax?: number | null;
  tags?: string[];
  source?: EventSourceKind | null;
  limit?: number;
}

export interface EventRepository {
  upsertEvent(input: EventInput): Promise<EventRecord>;
  getEventsByIds(ids: number[]): Promise<EventRecord[]>;
  listEvents(filter?: EventFilter): Promise<EventRecord[]>;
  /** Every stored event ordered by date, without the listing cap. */
  listAllEvents(): Promise<EventRecord[]>;
}

export function buildEventKey(source: EventSourceKind, sourceId: string): string {
  const digest = createHash('sha1').update(sourceId).digest('hex');
  return `${source}__${digest}`;
}

/**
 * Applies an incoming record on top of the stored one. Non-null incoming
 * values win; the price pair moves together. Identity and createdAt are kept.
 */
export function mergeEventRecord(existing: EventRecord, input: EventInput, updatedAt: string): EventRecord {
  const hasPrice = input.priceMin !== null || input.priceMax !== null;
  return {
    ...existing,
    title: input.title,
    description: input.description,
    dateStart: input.dateStart ?? existing.dateStart,
    dateEnd: input.dateEnd ?? existing.dateEnd,
    location: input.location,
    priceMin: hasPrice ? input.priceMin : existing.priceMin,
    priceMax: hasPrice ? input.priceMax : existing.priceMax,
    url: input.url,
    raw: input.raw ?? existing.raw,
    tags: [...input.tags],
    updatedAt,
  };
}

export function matchesEventFilter(event: EventRecord, filter: EventFilter): boolean {
  if (filter.source && event.source !== filter.source) {
    return false;
  }

  const query = filter.query?.trim().toLowerCase();
  if (query) {
    const haystack = `${event.title} ${event.description} ${event.location}`.toLowerCase();
    if (!haystack.includes(query)) {
      return false;
    }
  }

  if (filter.dateStart || filter.dateEnd) {
    const day = event.dateStart?.slice(0, 10);
    if (!day) {
      return false;
    }
    if (filter.dateStart && day < filter.dateStart.slice(0, 10)) {
      return false;
    }
    if (filter.dateEnd && day > filter.dateEnd.slice(0, 10)) {
      return false;
    }
  }

  if (filter.priceMax !== null && filter.priceMax !== undefined && event.priceMax !== null) {
    if (event.priceMax > filter.priceMax) {
      return false;
    }
  }

  if (filter.tags && filter.tags.length > 0) {
    const wanted = new Set(filter.tags);
    if (!event.tags.some(tag => wanted.has(tag))) {
      return false;
    }
  }

  return true;
}

/**
 * Undated events sort last; ties fall back to id.
 */
export function compareEventsByDate(left: EventRecord, right: EventRecord): number {
  if (left.dateStart !== right.dateStart) {
    if (left.dateStart === null) {
      return 1;
    }
    if (right.dateStart === null) {
      return -1;
    }
    return left.dateStart < right.dateStart ? -1 : 1;
  }
  return left.id - right.id;
}

export function resolveListLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) {
    return MAX_EVENT_LIST_LIMIT;
  }
  return Math.min(Math.floor(limit), MAX_EVENT_LIST_LIMIT);
}

export function applyEventFilter(events: Iterable<EventRecord>, filter: EventFilter = {}): EventRecord[] {
  return Array.from(events)
    .filter(event => matchesEventFilter(event, filter))
    .sort(compareEventsByDate)
    .slice(0, resolveListLimit(filter.limit));
}

export class FirestoreEventStore implements EventRepository {
  private readonly db: Firestore;
  private readonly now: () => Date;

  constructor(db: Firestore, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  async upsertEvent(input: EventInput): Promise<EventRecord> {
    const docRef = this.db.collection(EVENTS_COLLECTION).doc(buildEventKey(input.source, input.sourceId));
    const counterRef = this.db.collection(COUNTERS_COLLECTION).doc(EVENTS_COUNTER_DOC);
    const timestamp = this.now().toISOString();

    return this.db.runTransaction(async transaction => {
      const snapshot = await transaction.get(docRef);
      const existing = snapshot.exists ? fromEventDocument(snapshot.data()) : null;

      let record: EventRecord;
      if (existing) {
        record = mergeEventRecord(existing, input, timestamp);
      } else {
        const counter = await transaction.get(counterRef);
        const id = readCounter(counter.data());
        transaction.set(counterRef, { next: id + 1 }, { merge: true });
        record = { ...input, tags: [...input.tags], id, createdAt: timestamp, updatedAt: timestamp };
      }

      transaction.set(docRef, toEventDocument(record));
      return record;
    });
  }

  async getEventsByIds(ids: number[]): Promise<EventRecord[]> {
    const unique = Array.from(new Set(ids));
    const byId = new Map<number, EventRecord>();

    for (let index = 0; index < unique.length; index += IN_QUERY_CHUNK_SIZE) {
      const chunk = unique.slice(index, index + IN_QUERY_CHUNK_SIZE);
      const snapshot = await this.db.collection(EVENTS_COLLECTION).where('id', 'in', chunk).get();
      for (const doc of snapshot.docs) {
        const record = fromEventDocument(doc.data());
        if (record) {
          byId.set(record.id, record);
        }
      }
    }

    return unique.flatMap(id => {
      const record = byId.get(id);
      return record ? [record] : [];
    });
  }

  async listEvents(filter: EventFilter = {}): Promise<EventRecord[]> {
    let query = this.db.collection(EVENTS_COLLECTION).orderBy('dateStart');
    if (filter.dateStart) {
      query = query.where('dateStart', '>=', filter.dateStart.slice(0, 10));
    }

    const snapshot = await query.get();
    const records = snapshot.docs.flatMap(doc => {
      const record = fromEventDocument(doc.data());
      return record ? [record] : [];
    });
    return applyEventFilter(records, filter);
  }

  async listAllEvents(): Promise<EventRecord[]> {
    const records: EventRecord[] = [];
    let cursor: QueryDocumentSnapshot | null = null;

    for (;;) {
      let query = this.db.collection(EVENTS_COLLECTION).orderBy(FieldPath.documentId()).limit(SCAN_PAGE_SIZE);
      if (cursor) {
        query = query.startAfter(cursor);
      }
      const snapshot: QuerySnapshot = await query.get();
      for (const doc of snapshot.docs) {
        const record = fromEventDocument(doc.data());
        if (record) {
          records.push(record);
        }
      }
      if (snapshot.docs.length < SCAN_PAGE_SIZE) {
        break;
      }
      cursor = snapshot.docs[snapshot.docs.length - 1];
    }

    return records.sort(compareEventsByDate);
  }
}

function readCounter(data: DocumentData | undefined): number {
  const next = data?.next;
  return typeof next === 'number' && Number.isInteger(next) && next > 0 ? next : 1;
}

function toEventDocument(record: EventRecord): DocumentData {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    dateStart: record.dateStart,
    dateEnd: record.dateEnd,
    location: record.location,
    priceMin: record.priceMin,
    priceMax: record.priceMax,
    url: record.url,
    source: record.source,
    sourceId: record.sourceId,
    raw: record.raw ? pruneUndefinedDeep(record.raw) : null,
    tags: record.tags,
    createdAt: Timestamp.fromDate(new Date(record.createdAt)),
    updatedAt: Timestamp.fromDate(new Date(record.updatedAt)),
  };
}

export function fromEventDocument(data: DocumentData | undefined): EventRecord | null {
  if (!data || typeof data.id !== 'number' || !isEventSourceKind(data.source)) {
    return null;
  }

  return {
    id: data.id,
    title: readString(data.title),
    description: readString(data.description),
    dateStart: readNullableString(data.dateStart),
    dateEnd: readNullableString(data.dateEnd),
    location: readString(data.location),
    priceMin: readNullableNumber(data.priceMin),
    priceMax: readNullableNumber(data.priceMax),
    url: readString(data.url),
    source: data.source,
    sourceId: readString(data.sourceId),
    raw: readRawEventPayload(data.raw),
    tags: Array.isArray(data.tags) ? data.tags.filter((tag): tag is string => typeof tag === 'string') : [],
    createdAt: readTimestamp(data.createdAt),
    updatedAt: readTimestamp(data.updatedAt),
  };
}

function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function readNullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function readNullableNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readTimestamp(value: unknown): string {
  if (value instanceof Timestamp) {
    return value.toDate().toISOString();
  }
  return typeof value === 'string' ? value : '';
}

function pruneUndefinedDeep(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map(item => pruneUndefinedDeep(item))
      .filter(item => item !== undefined);
  }

  if (typeof value === 'object') {
    if (value instanceof Date || value instanceof Timestamp) {
      return value;
    }

    const record: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      const pruned = pruneUndefinedDeep(child);
      if (pruned !== undefined) {
        record[key] = pruned;
      }
    }
    return record;
  }

  return value;
}
