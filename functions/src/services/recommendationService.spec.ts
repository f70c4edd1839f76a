import assert from 'node:assert/strict';
import test from 'node:test';
import { defaultPreferences } from './adminPreferences';
import {
  buildOverlapByEvent,
  computeRecommendations,
  DEFAULT_RECOMMENDATION_TOP_N,
  type RankableEvent,
} from './recommendationService';

function rankable(overrides: Partial<RankableEvent> & { id: number }): RankableEvent {
  return { dateStart: '2026-05-01T19:00:00.000Z', priceMin: null, priceMax: null, tags: [], ...overrides };
}

test('computeRecommendations blends interest, overlap and admin fit', () => {
  const events = [
    rankable({ id: 1, priceMin: 10, priceMax: 20, tags: ['artsy'] }),
    rankable({ id: 2, dateStart: '2026-05-02T19:00:00.000Z', tags: ['outdoor'] }),
    rankable({ id: 3, priceMin: 80, priceMax: 120 }),
    rankable({ id: 4, dateStart: '2026-05-04T19:00:00.000Z' }),
  ];
  const preferences = {
    ...defaultPreferences(),
    budgetCap: 100,
    wantedTags: ['artsy'],
    blackoutDates: ['2026-05-04'],
  };

  const ranked = computeRecommendations(
    events,
    new Map([[1, 2], [2, 4], [3, 5]]),
    new Map([[1, 1], [2, 0.5]]),
    preferences,
  );

  assert.deepEqual(ranked.map(event => event.id), [1, 2]);
  assert.ok(Math.abs(ranked[0].compositeScore - 0.76) < 1e-9);
  assert.ok(Math.abs(ranked[1].compositeScore - 0.52) < 1e-9);
  assert.ok(Math.abs(ranked[0].interestScore - 0.4) < 1e-9);
  assert.equal(ranked[0].adminScore, 1);
  assert.equal(ranked[1].overlapScore, 0.5);
});

test('ties break on overlap, then lower price', () => {
  const events = [
    rankable({ id: 10, priceMin: 20 }),
    rankable({ id: 11, priceMin: 5 }),
    rankable({ id: 12, priceMin: 50 }),
  ];
  const ranked = computeRecommendations(
    events,
    new Map(),
    new Map([[10, 0.5], [11, 0.5], [12, 0.9]]),
    defaultPreferences(),
    { weights: { interest: 0, overlap: 0, admin: 0 } },
  );
  assert.deepEqual(ranked.map(event => event.id), [12, 11, 10]);
});

test('computeRecommendations returns the top N', () => {
  const events = Array.from({ length: 8 }, (_, index) => rankable({ id: index + 1 }));
  const overlap = new Map(events.map(event => [event.id, 0]));
  assert.equal(computeRecommendations(events, new Map(), overlap, defaultPreferences()).length, DEFAULT_RECOMMENDATION_TOP_N);
  assert.equal(computeRecommendations(events, new Map(), overlap, defaultPreferences(), { topN: 2 }).length, 2);
});

test('buildOverlapByEvent prefers slots on the event day', () => {
  const availability = {
    participantCount: 4,
    slots: [
      { date: '2026-05-01', timeStart: '10:00', timeEnd: '12:00', participantIds: [1], overlapScore: 0.25 },
      { date: '2026-05-01', timeStart: '18:00', timeEnd: '21:00', participantIds: [1, 2], overlapScore: 0.5 },
      { date: '2026-05-09', timeStart: '18:00', timeEnd: '21:00', participantIds: [1, 2, 3], overlapScore: 0.75 },
    ],
  };
  const overlap = buildOverlapByEvent(
    [
      { id: 1, dateStart: '2026-05-01T19:00:00.000Z' },
      { id: 2, dateStart: '2026-05-02T19:00:00.000Z' },
      { id: 3, dateStart: null },
    ],
    availability,
  );
  assert.deepEqual(Array.from(overlap.entries()), [[1, 0.5], [2, 0.75], [3, 0.75]]);

  const empty = buildOverlapByEvent([{ id: 1, dateStart: null }], { participantCount: 0, slots: [] });
  assert.equal(empty.get(1), 0);
});
