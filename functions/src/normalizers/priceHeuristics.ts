export interface PriceRange {
  min: number | null;
  max: number | null;
}

const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;

const PRICE_EXPRESSION = /\bfree\b|\$\s?\d+(?:\.\d{1,2})?(?:\s*(?:-|–|—|to)\s*\$?\s?\d+(?:\.\d{1,2})?)?/i;

/**
 * Reads a price range out of free text. "Free" anywhere wins; otherwise the
 * lowest and highest numbers found become the range.
 */
export function parsePrice(text: string | null | undefined): PriceRange {
  if (!text) {
    return { min: null, max: null };
  }

  const lowered = text.toLowerCase().trim();
  if (lowered.includes('free')) {
    return { min: 0, max: 0 };
  }

  const numbers = (lowered.match(NUMBER_PATTERN) ?? []).map(token => Number.parseFloat(token));
  if (numbers.length === 0) {
    return { min: null, max: null };
  }

  return {
    min: Math.min(...numbers),
    max: Math.max(...numbers),
  };
}

/**
 * Picks the first price-looking fragment out of a scraped card ("Free",
 * "$15", "$10 - $25") so that dates and counts elsewhere in the text stay out
 * of the price parse.
 */
export function extractPriceText(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }
  const match = text.match(PRICE_EXPRESSION);
  return match ? match[0].trim() : null;
}
