export const PRIORITY_KEYWORDS: readonly string[] = [
  'immersive',
  'theater',
  'theatre',
  'pop-up',
  'popup',
  'exhibit',
  'festival',
];

/** Substrings that mark news, guides, closures and lists rather than events. */
export const NON_EVENT_KEYWORDS: readonly string[] = [
  'cheapest',
  'closure',
  'closed',
  'closing',
  'permanently closed',
  'news',
  'article',
  'report',
  'roundup',
  'guide to',
  'best bakery',
  'best restaurant',
  'best bars',
  'best things',
  'permanently shut',
  'shut down',
  'going out of business',
  'list of',
  'top 10',
  'top 15',
  'top 20',
  'things to know',
];

const ROUNDUP_TITLE_PHRASES = ['things to do', 'happenings', "you can't miss"];

export const DEFAULT_CURATION_TOP_N = 30;

export interface CurationCandidate {
  id?: number | null;
  title: string;
  description: string;
  dateStart: string | null;
  source: string;
}

export interface CurationOptions {
  targetYear?: number | null;
  targetMonth?: number | null;
  websitesOnly?: boolean;
  topN?: number;
  now?: Date;
}

interface CalendarPrefix {
  year: number;
  month: number;
  key: string;
}

/**
 * Builds the voting list: source filter, non-event filter, target month
 * (with an upcoming-then-anything fallback when the month is empty),
 * quality ranking, cap. Pure and deterministic for a given `now`.
 */
export function curateVotingEvents<T extends CurationCandidate>(
  events: readonly T[],
  options: CurationOptions = {},
): T[] {
  const websitesOnly = options.websitesOnly ?? true;
  const topN = options.topN ?? DEFAULT_CURATION_TOP_N;
  const targetYear = options.targetYear ?? null;
  const targetMonth = options.targetMonth ?? null;
  const monthFilterActive = targetYear !== null || targetMonth !== null;

  const eventLike = events
    .filter(event => !websitesOnly || event.source === 'scraped')
    .filter(looksLikeEvent);

  let selected = monthFilterActive
    ? eventLike.filter(event => inTargetMonth(parseDatePrefix(event.dateStart), targetYear, targetMonth))
    : [...eventLike];

  if (selected.length === 0 && monthFilterActive) {
    const today = (options.now ?? new Date()).toISOString().slice(0, 10);
    const upcoming = eventLike.filter(event => {
      const prefix = parseDatePrefix(event.dateStart);
      return prefix !== null && prefix.key >= today;
    });
    selected = upcoming.length > 0 ? upcoming : [...eventLike];
  }

  return selected
    .map(event => ({ event, quality: qualityScore(event) }))
    .sort((left, right) => compareCurated(left, right))
    .slice(0, Math.max(0, topN))
    .map(entry => entry.event);
}

export function looksLikeEvent(event: CurationCandidate): boolean {
  const title = event.title.toLowerCase();
  const text = `${title} ${event.description.toLowerCase()}`;
  if (NON_EVENT_KEYWORDS.some(keyword => text.includes(keyword))) {
    return false;
  }
  if (ROUNDUP_TITLE_PHRASES.some(phrase => title.includes(phrase))) {
    return false;
  }
  const hasDigit = /\d/.test(title);
  return !(hasDigit && (title.includes('top ') || title.includes('best ')));
}

export function qualityScore(event: CurationCandidate): number {
  const title = event.title.trim();
  const description = event.description.trim();
  const richness = Math.min(title.length * 0.5 + description.length * 0.3, 50);

  const text = `${title} ${description}`.toLowerCase();
  const hits = PRIORITY_KEYWORDS.filter(keyword => text.includes(keyword)).length;
  return richness + Math.min(hits * 10, 30);
}

function compareCurated<T extends CurationCandidate>(
  left: { event: T; quality: number },
  right: { event: T; quality: number },
): number {
  if (left.quality !== right.quality) {
    return right.quality - left.quality;
  }
  const leftId = left.event.id ?? 0;
  const rightId = right.event.id ?? 0;
  if (leftId !== rightId) {
    return leftId - rightId;
  }
  const leftDate = left.event.dateStart ?? '';
  const rightDate = right.event.dateStart ?? '';
  if (leftDate === rightDate) {
    return 0;
  }
  return leftDate < rightDate ? -1 : 1;
}

function parseDatePrefix(value: string | null): CalendarPrefix | null {
  const match = value?.trim().slice(0, 10).match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return null;
  }
  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return { year, month, key: match[0] };
}

function inTargetMonth(prefix: CalendarPrefix | null, year: number | null, month: number | null): boolean {
  if (!prefix) {
    return false;
  }
  if (year !== null && prefix.year !== year) {
    return false;
  }
  return month === null || prefix.month === month;
}
