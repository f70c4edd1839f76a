import * as cheerio from 'cheerio';
import type { ScrapedRawEvent } from '../../models/event';
import {
  buildScrapedEvent,
  findImageUrl,
  findLinkUrl,
  flattenSelection,
  isListicleText,
} from './extraction';
import type { ScrapedPage, ScrapeStrategy } from './types';

export const SEGMENT_MAX_LENGTH = 1500;

const HEADING_SELECTOR = 'h2, h3, h4';

export const LISTICLE_HEADING_PATTERNS: readonly RegExp[] = [
  /^top \d+/i,
  /^best\b/i,
  /things to do/i,
  /^\d+\s+(best|things|ways)/i,
];

export function isListicleHeading(title: string): boolean {
  return LISTICLE_HEADING_PATTERNS.some(pattern => pattern.test(title));
}

/**
 * For long-form guide pages: each h2-h4 heading starts an event and the
 * sibling content up to the next heading is its body.
 */
export class HeadingSegmentStrategy implements ScrapeStrategy {
  readonly name = 'heading_segments';

  extract(page: ScrapedPage): ScrapedRawEvent[] {
    const $ = cheerio.load(page.html);
    const events: ScrapedRawEvent[] = [];
    const seen = new Set<string>();

    $(HEADING_SELECTOR).each((_index, element) => {
      const heading = $(element);
      const title = flattenSelection(heading);
      if (!title || isListicleHeading(title)) {
        return;
      }

      const parts: string[] = [];
      let length = 0;
      let url = findLinkUrl(heading, page.pageUrl);
      let imageUrl = findImageUrl(heading, page.pageUrl);
      let sibling = heading.next();

      while (
        sibling.length > 0 &&
        length < SEGMENT_MAX_LENGTH &&
        !sibling.is(HEADING_SELECTOR) &&
        sibling.find(HEADING_SELECTOR).length === 0
      ) {
        const text = flattenSelection(sibling);
        if (text) {
          parts.push(text);
          length += text.length + 1;
        }
        url = url ?? findLinkUrl(sibling, page.pageUrl);
        imageUrl = imageUrl ?? findImageUrl(sibling, page.pageUrl);
        sibling = sibling.next();
      }

      const body = parts.join(' ').slice(0, SEGMENT_MAX_LENGTH).trim();
      if (!body || isListicleText(body, page.now)) {
        return;
      }

      const event = buildScrapedEvent({
        sourceName: page.sourceName,
        pageUrl: page.pageUrl,
        title,
        description: body,
        text: `${title} ${body}`,
        url,
        imageUrl,
        location: '',
        now: page.now,
      });

      if (seen.has(event.sourceId)) {
        return;
      }
      seen.add(event.sourceId);
      events.push(event);
    });

    return events;
  }
}
