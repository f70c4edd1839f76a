import { isRecord } from '../models/event';

export interface AdminPreferences {
  budgetCap: number | null;
  wantedTags: string[];
  /** Stored with the session; ranking does not consult it. */
  minAttendees: number;
  blackoutDates: string[];
  dateRangeStart: string | null;
  dateRangeEnd: string | null;
}

export interface FilterableEvent {
  dateStart: string | null;
  priceMax: number | null;
}

const PLAIN_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function defaultPreferences(): AdminPreferences {
  return {
    budgetCap: null,
    wantedTags: [],
    minAttendees: 1,
    blackoutDates: [],
    dateRangeStart: null,
    dateRangeEnd: null,
  };
}

/**
 * Reads preferences from an untyped payload. Fields that are missing or
 * malformed keep their defaults.
 */
export function loadPreferences(payload: unknown): AdminPreferences {
  const preferences = defaultPreferences();
  if (!isRecord(payload)) {
    return preferences;
  }

  if (typeof payload.budgetCap === 'number' && Number.isFinite(payload.budgetCap) && payload.budgetCap >= 0) {
    preferences.budgetCap = payload.budgetCap;
  }
  if (Array.isArray(payload.wantedTags)) {
    preferences.wantedTags = Array.from(new Set(
      payload.wantedTags
        .filter((tag: unknown): tag is string => typeof tag === 'string')
        .map(tag => tag.trim().toLowerCase())
        .filter(tag => tag.length > 0),
    ));
  }
  if (typeof payload.minAttendees === 'number' && Number.isInteger(payload.minAttendees) && payload.minAttendees >= 1) {
    preferences.minAttendees = payload.minAttendees;
  }
  if (Array.isArray(payload.blackoutDates)) {
    preferences.blackoutDates = payload.blackoutDates.filter(isPlainDate);
  }
  if (isPlainDate(payload.dateRangeStart)) {
    preferences.dateRangeStart = payload.dateRangeStart;
  }
  if (isPlainDate(payload.dateRangeEnd)) {
    preferences.dateRangeEnd = payload.dateRangeEnd;
  }
  return preferences;
}

function isPlainDate(value: unknown): value is string {
  return typeof value === 'string' && PLAIN_DATE.test(value);
}

/**
 * Drops events over budget, on a blackout day, or outside the date window.
 * Dates compare as YYYY-MM-DD strings; undated events only face the budget check.
 */
export function applyHardFilters<T extends FilterableEvent>(events: readonly T[], preferences: AdminPreferences): T[] {
  const blackout = new Set(preferences.blackoutDates);
  return events.filter(event => {
    if (preferences.budgetCap !== null && event.priceMax !== null && event.priceMax > preferences.budgetCap) {
      return false;
    }
    const day = event.dateStart ? event.dateStart.slice(0, 10) : '';
    if (!day) {
      return true;
    }
    if (blackout.has(day)) {
      return false;
    }
    if (preferences.dateRangeStart && day < preferences.dateRangeStart) {
      return false;
    }
    return !(preferences.dateRangeEnd && day > preferences.dateRangeEnd);
  });
}

export function computeAdminScore(event: { tags: readonly string[] }, preferences: AdminPreferences): number {
  const wanted = new Set(preferences.wantedTags.map(tag => tag.toLowerCase()));
  if (wanted.size === 0) {
    return 0;
  }
  const eventTags = new Set(event.tags.map(tag => tag.toLowerCase()));
  let hits = 0;
  for (const tag of wanted) {
    if (eventTags.has(tag)) {
      hits += 1;
    }
  }
  return hits / wanted.size;
}
