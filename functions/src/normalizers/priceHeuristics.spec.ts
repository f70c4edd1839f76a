import assert from 'node:assert/strict';
import test from 'node:test';
import { extractPriceText, parsePrice } from './priceHeuristics';

test('parsePrice returns an empty range for missing text', () => {
  assert.deepEqual(parsePrice(null), { min: null, max: null });
  assert.deepEqual(parsePrice(''), { min: null, max: null });
  assert.deepEqual(parsePrice('Call for pricing'), { min: null, max: null });
});

test('parsePrice treats any mention of free as zero cost', () => {
  assert.deepEqual(parsePrice('FREE admission, donations $5'), { min: 0, max: 0 });
});

test('parsePrice uses the lowest and highest numbers', () => {
  assert.deepEqual(parsePrice('$25'), { min: 25, max: 25 });
  assert.deepEqual(parsePrice('$15 - $40.50'), { min: 15, max: 40.5 });
  assert.deepEqual(parsePrice('Tickets from $10, VIP $45, 2 drinks included'), { min: 2, max: 45 });
});

test('extractPriceText picks the first price expression only', () => {
  assert.equal(extractPriceText('Join us March 5 at 7pm. Tickets $20 - $35 at the door'), '$20 - $35');
  assert.equal(extractPriceText('Free entry on May 3'), 'Free');
  assert.equal(extractPriceText('Open daily 10-5'), null);
  assert.equal(extractPriceText(null), null);
});

test('extractPriceText keeps dates out of the price parse', () => {
  const text = 'May 12, 2026 · $18 per person';
  assert.deepEqual(parsePrice(extractPriceText(text)), { min: 18, max: 18 });
  assert.deepEqual(parsePrice(text), { min: 12, max: 2026 });
});
