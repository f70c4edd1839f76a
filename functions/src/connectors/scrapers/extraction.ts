import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { ScrapedRawEvent } from '../../models/event';
import { countDatePhrases, parseDateText } from '../../normalizers/dateHeuristics';
import { extractPriceText } from '../../normalizers/priceHeuristics';
import { shortHash } from '../../utils/hash';
import { flattenNodeText } from '../../utils/html';

export const LISTICLE_TEXT_MIN_LENGTH = 600;
export const LISTICLE_MAX_DATE_PHRASES = 3;

export function flattenSelection<T extends AnyNode>(selection: Cheerio<T>): string {
  return selection
    .toArray()
    .map(node => flattenNodeText(node))
    .filter(text => text.length > 0)
    .join(' ');
}

/**
 * Resolves a link or image reference against the page it came from.
 * Protocol-relative references become https.
 */
export function resolveUrl(value: string | undefined, pageUrl: string): string | null {
  const trimmed = value?.trim();
  if (!trimmed || trimmed.startsWith('data:') || trimmed.startsWith('javascript:')) {
    return null;
  }
  if (trimmed.startsWith('//')) {
    return `https:${trimmed}`;
  }
  try {
    const resolved = new URL(trimmed, pageUrl);
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : null;
  } catch {
    return null;
  }
}

export function findImageUrl<T extends AnyNode>(scope: Cheerio<T>, pageUrl: string): string | null {
  const image: Cheerio<AnyNode> = scope.is('img') ? scope.first() : scope.find('img').first();
  if (image.length === 0) {
    return null;
  }
  const candidate = image.attr('src') || image.attr('data-src') || firstSrcsetUrl(image.attr('srcset'));
  return resolveUrl(candidate, pageUrl);
}

export function findLinkUrl<T extends AnyNode>(scope: Cheerio<T>, pageUrl: string): string | null {
  const href = scope.is('a[href]') ? scope.attr('href') : scope.find('a[href]').first().attr('href');
  return resolveUrl(href, pageUrl);
}

function firstSrcsetUrl(srcset: string | undefined): string | undefined {
  if (!srcset) {
    return undefined;
  }
  const [first] = srcset.split(',');
  return first?.trim().split(/\s+/)[0] || undefined;
}

/**
 * Long blocks that mention many dates are roundup articles, not one event.
 */
export function isListicleText(text: string, now: Date): boolean {
  return text.length > LISTICLE_TEXT_MIN_LENGTH && countDatePhrases(text, now) > LISTICLE_MAX_DATE_PHRASES;
}

export function buildScrapedSourceId(sourceName: string, title: string): string {
  return `${sourceName}-${shortHash(title)}`;
}

export interface ScrapedEventFields {
  sourceName: string;
  pageUrl: string;
  title: string;
  description: string;
  text: string;
  url: string | null;
  imageUrl: string | null;
  location: string;
  now: Date;
}

export function buildScrapedEvent(fields: ScrapedEventFields): ScrapedRawEvent {
  const date = parseDateText(fields.text, fields.now);

  return {
    kind: 'scraped',
    sourceName: fields.sourceName,
    sourceId: buildScrapedSourceId(fields.sourceName, fields.title),
    title: fields.title,
    description: fields.description,
    dateStart: date.dateStart,
    dateEnd: date.dateEnd,
    dateStatus: date.status,
    priceText: extractPriceText(fields.text),
    imageUrl: fields.imageUrl,
    url: fields.url ?? fields.pageUrl,
    location: fields.location,
    pageUrl: fields.pageUrl,
  };
}
