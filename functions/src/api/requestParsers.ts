import { isRecord } from '../models/event';
import type { AvailabilityRow } from '../services/availabilityService';
import type { RecommendationWeights } from '../services/recommendationService';

const PLAIN_DATE = /^\d{4}-\d{2}-\d{2}$/;
const MAX_TAGS = 10;

/** Bad client input; the API answers 400 with the message. */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export function readQueryString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (Array.isArray(value)) {
    return readQueryString(value[0]);
  }
  return undefined;
}

export function parseOptionalNumber(value: unknown, field: string): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new RequestValidationError(`${field} must be a number`);
    }
    return value;
  }
  const text = readQueryString(value);
  if (text === undefined) {
    return null;
  }
  const parsed = Number(text);
  if (!Number.isFinite(parsed)) {
    throw new RequestValidationError(`${field} must be a number`);
  }
  return parsed;
}

export function parseOptionalInteger(
  value: unknown,
  field: string,
  bounds: { min: number; max: number },
): number | null {
  const parsed = parseOptionalNumber(value, field);
  if (parsed === null) {
    return null;
  }
  if (!Number.isInteger(parsed) || parsed < bounds.min || parsed > bounds.max) {
    throw new RequestValidationError(`${field} must be an integer between ${bounds.min} and ${bounds.max}`);
  }
  return parsed;
}

export function parseOptionalDate(value: unknown, field: string): string | null {
  const text = readQueryString(value);
  if (text === undefined) {
    return null;
  }
  if (!PLAIN_DATE.test(text) || Number.isNaN(Date.parse(`${text}T00:00:00Z`))) {
    throw new RequestValidationError(`${field} must be a YYYY-MM-DD date`);
  }
  return text;
}

export function parseBooleanParam(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  const text = readQueryString(value)?.toLowerCase();
  if (text === undefined) {
    return fallback;
  }
  return text === 'true' || text === '1' || text === 'yes';
}

export function parseTagList(value: unknown): string[] {
  const text = readQueryString(value) ?? '';
  return text
    .split(',')
    .map(tag => tag.trim().toLowerCase())
    .filter(tag => tag.length > 0)
    .slice(0, MAX_TAGS);
}

/**
 * `{ "12": 3, "15": 1 }` keyed by event id.
 */
export function parseEventNumberMap(value: unknown, field: string): Map<number, number> {
  const result = new Map<number, number>();
  if (value === undefined || value === null) {
    return result;
  }
  if (!isRecord(value)) {
    throw new RequestValidationError(`${field} must be an object keyed by event id`);
  }
  for (const [key, raw] of Object.entries(value)) {
    const id = Number(key);
    if (!Number.isInteger(id) || typeof raw !== 'number' || !Number.isFinite(raw)) {
      throw new RequestValidationError(`${field} must map integer event ids to numbers`);
    }
    result.set(id, raw);
  }
  return result;
}

export function parseEventIds(value: unknown): number[] | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!Array.isArray(value) || !value.every((id: unknown) => typeof id === 'number' && Number.isInteger(id))) {
    throw new RequestValidationError('eventIds must be an array of integers');
  }
  return value.filter((id: unknown): id is number => typeof id === 'number');
}

export function parseAvailabilityRows(value: unknown): AvailabilityRow[] {
  if (!Array.isArray(value)) {
    throw new RequestValidationError('rows must be an array');
  }
  return value.map((row: unknown, index: number) => {
    if (
      !isRecord(row) ||
      typeof row.participantId !== 'number' ||
      typeof row.date !== 'string' ||
      typeof row.timeStart !== 'string' ||
      typeof row.timeEnd !== 'string'
    ) {
      throw new RequestValidationError(`rows[${index}] must have participantId, date, timeStart and timeEnd`);
    }
    return {
      participantId: row.participantId,
      date: row.date,
      timeStart: row.timeStart,
      timeEnd: row.timeEnd,
    };
  });
}

export function parseParticipantCount(value: unknown, fallback: number): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new RequestValidationError('participantCount must be a non-negative integer');
  }
  return value;
}

export function parseWeights(value: unknown): RecommendationWeights | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (
    !isRecord(value) ||
    typeof value.interest !== 'number' ||
    typeof value.overlap !== 'number' ||
    typeof value.admin !== 'number'
  ) {
    throw new RequestValidationError('weights must include numeric interest, overlap and admin');
  }
  return { interest: value.interest, overlap: value.overlap, admin: value.admin };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
