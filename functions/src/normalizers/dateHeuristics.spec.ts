import assert from 'node:assert/strict';
import test from 'node:test';
import { countDatePhrases, parseDateText, parseIsoDate } from './dateHeuristics';

const NOW = new Date('2026-03-01T12:00:00Z');

test('a single date phrase resolves to midnight UTC', () => {
  const result = parseDateText('Opens June 5, 2026 at 7pm', NOW);
  assert.equal(result.status, 'single');
  assert.equal(result.dateStart, '2026-06-05T00:00:00.000Z');
  assert.equal(result.dateEnd, null);
});

test('ordinal suffixes are accepted', () => {
  const result = parseDateText('Doors open September 21st, 2026', NOW);
  assert.equal(result.status, 'single');
  assert.equal(result.dateStart, '2026-09-21T00:00:00.000Z');
});

test('repeating the same date still counts as one phrase', () => {
  const result = parseDateText('May 3 only. See you May 3!', NOW);
  assert.equal(result.status, 'single');
  assert.equal(result.dateStart, '2026-05-03T00:00:00.000Z');
});

test('a day range without a year uses the current UTC year', () => {
  const result = parseDateText('Running July 10-12 in Brooklyn', NOW);
  assert.equal(result.status, 'range');
  assert.equal(result.dateStart, '2026-07-10T00:00:00.000Z');
  assert.equal(result.dateEnd, '2026-07-12T00:00:00.000Z');
});

test('a reversed range is unclear', () => {
  const result = parseDateText('Aug 20-5', NOW);
  assert.equal(result.status, 'unclear');
  assert.equal(result.dateStart, null);
  assert.equal(result.dateEnd, null);
});

test('several distinct dates are multiple with no parsed dates', () => {
  const result = parseDateText('Shows on May 3 and May 10', NOW);
  assert.equal(result.status, 'multiple');
  assert.equal(result.dateStart, null);
  assert.equal(result.dateEnd, null);
  assert.deepEqual(result.phrases, ['May 3', 'May 10']);
});

test('text without a date phrase is unclear', () => {
  const result = parseDateText('Every weekend this spring', NOW);
  assert.equal(result.status, 'unclear');
  assert.deepEqual(result.phrases, []);
});

test('an impossible calendar day is unclear', () => {
  assert.equal(parseDateText('February 30, 2026', NOW).status, 'unclear');
});

test('countDatePhrases counts ranges and single dates', () => {
  assert.equal(countDatePhrases('March 1, April 2 and May 3-5', NOW), 3);
  assert.equal(countDatePhrases(null, NOW), 0);
});

test('parseIsoDate reads zone-less timestamps as UTC', () => {
  assert.equal(parseIsoDate('2026-04-05T19:30:00'), '2026-04-05T19:30:00.000Z');
  assert.equal(parseIsoDate('2026-04-05 19:30:00'), '2026-04-05T19:30:00.000Z');
  assert.equal(parseIsoDate('2026-04-05'), '2026-04-05T00:00:00.000Z');
});

test('parseIsoDate honours explicit offsets', () => {
  assert.equal(parseIsoDate('2026-04-05T19:30:00-04:00'), '2026-04-05T23:30:00.000Z');
  assert.equal(parseIsoDate(new Date('2026-01-02T03:04:05Z')), '2026-01-02T03:04:05.000Z');
});

test('parseIsoDate falls back to the leading plain date', () => {
  assert.equal(parseIsoDate('2026-04-05T99:99'), '2026-04-05T00:00:00.000Z');
});

test('parseIsoDate returns null instead of throwing', () => {
  assert.equal(parseIsoDate('not a date'), null);
  assert.equal(parseIsoDate(''), null);
  assert.equal(parseIsoDate(null), null);
  assert.equal(parseIsoDate(42), null);
});
