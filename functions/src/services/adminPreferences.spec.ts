import assert from 'node:assert/strict';
import test from 'node:test';
import { applyHardFilters, computeAdminScore, defaultPreferences, loadPreferences } from './adminPreferences';

test('loadPreferences keeps defaults for missing or malformed fields', () => {
  assert.deepEqual(loadPreferences(null), defaultPreferences());
  assert.deepEqual(
    loadPreferences({
      budgetCap: -5,
      wantedTags: ['  Artsy ', 'artsy', 3, ''],
      minAttendees: 2.5,
      blackoutDates: ['2026-05-04', 'May 5'],
      dateRangeStart: '2026-05-01',
      dateRangeEnd: 'soon',
    }),
    {
      budgetCap: null,
      wantedTags: ['artsy'],
      minAttendees: 1,
      blackoutDates: ['2026-05-04'],
      dateRangeStart: '2026-05-01',
      dateRangeEnd: null,
    },
  );
});

test('applyHardFilters drops events over budget, on blackout days and outside the window', () => {
  const preferences = {
    ...defaultPreferences(),
    budgetCap: 50,
    blackoutDates: ['2026-05-04'],
    dateRangeStart: '2026-05-01',
    dateRangeEnd: '2026-05-31',
  };
  const events = [
    { name: 'cheap', dateStart: '2026-05-02T18:00:00.000Z', priceMax: 20 },
    { name: 'pricey', dateStart: '2026-05-02T18:00:00.000Z', priceMax: 80 },
    { name: 'blackout', dateStart: '2026-05-04T18:00:00.000Z', priceMax: null },
    { name: 'early', dateStart: '2026-04-30T18:00:00.000Z', priceMax: null },
    { name: 'late', dateStart: '2026-06-01T18:00:00.000Z', priceMax: null },
    { name: 'undated', dateStart: null, priceMax: 10 },
    { name: 'undated pricey', dateStart: null, priceMax: 90 },
  ];
  assert.deepEqual(
    applyHardFilters(events, preferences).map(event => event.name),
    ['cheap', 'undated'],
  );
});

test('computeAdminScore is the share of wanted tags present', () => {
  const preferences = { ...defaultPreferences(), wantedTags: ['artsy', 'outdoor'] };
  assert.equal(computeAdminScore({ tags: ['Outdoor', 'music'] }, preferences), 0.5);
  assert.equal(computeAdminScore({ tags: [] }, preferences), 0);
  assert.equal(computeAdminScore({ tags: ['artsy'] }, defaultPreferences()), 0);
});
