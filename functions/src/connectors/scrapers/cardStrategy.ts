import * as cheerio from 'cheerio';
import type { ScrapedRawEvent } from '../../models/event';
import { flattenNodeText } from '../../utils/html';
import {
  buildScrapedEvent,
  findImageUrl,
  findLinkUrl,
  flattenSelection,
  isListicleText,
} from './extraction';
import type { ScrapedPage, ScrapeStrategy } from './types';

export const CARD_SELECTOR = 'article, .event, .card';
export const TITLE_MAX_LENGTH = 120;

const HEADING_SELECTOR = 'h1, h2, h3, h4';
const LOCATION_SELECTOR = '.location, .venue, address';

/**
 * Treats every outermost card-like block as one candidate event.
 */
export class CardScrapeStrategy implements ScrapeStrategy {
  readonly name = 'cards';

  extract(page: ScrapedPage): ScrapedRawEvent[] {
    const $ = cheerio.load(page.html);
    const events: ScrapedRawEvent[] = [];
    const seen = new Set<string>();
    let listicles = 0;

    $(CARD_SELECTOR).each((index, element) => {
      const card = $(element);
      if (card.parents(CARD_SELECTOR).length > 0) {
        return;
      }

      const text = flattenNodeText(element);
      const imageUrl = findImageUrl(card, page.pageUrl);
      if (!text && !imageUrl) {
        return;
      }
      if (isListicleText(text, page.now)) {
        listicles += 1;
        return;
      }

      const headingText = flattenSelection(card.find(HEADING_SELECTOR).first());
      const title = (headingText || text).slice(0, TITLE_MAX_LENGTH).trim() || `Scraped Event ${index + 1}`;

      const event = buildScrapedEvent({
        sourceName: page.sourceName,
        pageUrl: page.pageUrl,
        title,
        description: text,
        text,
        url: findLinkUrl(card, page.pageUrl),
        imageUrl,
        location: flattenSelection(card.find(LOCATION_SELECTOR).first()),
        now: page.now,
      });

      if (seen.has(event.sourceId)) {
        return;
      }
      seen.add(event.sourceId);
      events.push(event);
    });

    if (listicles > 0) {
      console.log(`[SCRAPER] source=${page.sourceName} skipped_listicle_cards=${listicles}`);
    }

    return events;
  }
}
