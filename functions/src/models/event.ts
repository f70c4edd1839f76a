export type EventSourceKind = 'api' | 'scraped';

export type DateStatus = 'single' | 'range' | 'multiple' | 'unclear';

export interface OpenDataRawEvent {
  kind: 'api';
  eventName?: string;
  title?: string;
  description?: string;
  shortDescription?: string;
  startDateTime?: string;
  endDateTime?: string;
  location?: string;
  eventLocation?: string;
  price?: string;
  free?: boolean;
  eventUrl?: string;
  url?: string;
  eventId?: string;
  rowId?: string;
}

export interface ScrapedRawEvent {
  kind: 'scraped';
  sourceName: string;
  sourceId: string;
  title: string;
  description: string;
  dateStart: string | null;
  dateEnd: string | null;
  dateStatus: DateStatus;
  priceText: string | null;
  imageUrl: string | null;
  url: string;
  location: string;
  pageUrl: string;
}

export type RawEventPayload = OpenDataRawEvent | ScrapedRawEvent;

export interface EventInput {
  title: string;
  description: string;
  dateStart: string | null;
  dateEnd: string | null;
  location: string;
  priceMin: number | null;
  priceMax: number | null;
  url: string;
  source: EventSourceKind;
  sourceId: string;
  raw: RawEventPayload | null;
  tags: string[];
}

export interface EventRecord extends EventInput {
  id: number;
  createdAt: string;
  updatedAt: string;
}

export function isEventSourceKind(value: unknown): value is EventSourceKind {
  return value === 'api' || value === 'scraped';
}

const DATE_STATUSES: readonly DateStatus[] = ['single', 'range', 'multiple', 'unclear'];

export function isDateStatus(value: unknown): value is DateStatus {
  return typeof value === 'string' && (DATE_STATUSES as readonly string[]).includes(value);
}

/**
 * Rebuilds a tagged raw payload from stored data. Unknown shapes yield null.
 */
export function readRawEventPayload(value: unknown): RawEventPayload | null {
  if (!isRecord(value)) {
    return null;
  }

  if (value.kind === 'api') {
    const payload: OpenDataRawEvent = { kind: 'api' };
    for (const key of OPEN_DATA_STRING_FIELDS) {
      const field = value[key];
      if (typeof field === 'string') {
        payload[key] = field;
      }
    }
    if (typeof value.free === 'boolean') {
      payload.free = value.free;
    }
    return payload;
  }

  if (value.kind === 'scraped') {
    return {
      kind: 'scraped',
      sourceName: readString(value.sourceName),
      sourceId: readString(value.sourceId),
      title: readString(value.title),
      description: readString(value.description),
      dateStart: readNullableString(value.dateStart),
      dateEnd: readNullableString(value.dateEnd),
      dateStatus: isDateStatus(value.dateStatus) ? value.dateStatus : 'unclear',
      priceText: readNullableString(value.priceText),
      imageUrl: readNullableString(value.imageUrl),
      url: readString(value.url),
      location: readString(value.location),
      pageUrl: readString(value.pageUrl),
    };
  }

  return null;
}

const OPEN_DATA_STRING_FIELDS = [
  'eventName',
  'title',
  'description',
  'shortDescription',
  'startDateTime',
  'endDateTime',
  'location',
  'eventLocation',
  'price',
  'eventUrl',
  'url',
  'eventId',
  'rowId',
] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function readNullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}
