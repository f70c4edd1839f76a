export interface AvailabilityRow {
  participantId: number;
  date: string;
  timeStart: string;
  timeEnd: string;
}

export interface AvailabilitySlot {
  date: string;
  timeStart: string;
  timeEnd: string;
  participantIds: number[];
  overlapScore: number;
}

export interface AvailabilitySummary {
  participantCount: number;
  slots: AvailabilitySlot[];
}

/**
 * Groups rows into (date, start, end) slots in first-seen order and scores
 * each by the share of participants who can make it.
 */
export function aggregateAvailability(rows: readonly AvailabilityRow[], participantCount: number): AvailabilitySummary {
  const denominator = Math.max(participantCount, 1);
  const slots = new Map<string, { date: string; timeStart: string; timeEnd: string; ids: Set<number> }>();

  for (const row of rows) {
    const key = `${row.date}|${row.timeStart}|${row.timeEnd}`;
    let slot = slots.get(key);
    if (!slot) {
      slot = { date: row.date, timeStart: row.timeStart, timeEnd: row.timeEnd, ids: new Set<number>() };
      slots.set(key, slot);
    }
    slot.ids.add(row.participantId);
  }

  return {
    participantCount,
    slots: Array.from(slots.values(), slot => ({
      date: slot.date,
      timeStart: slot.timeStart,
      timeEnd: slot.timeEnd,
      participantIds: Array.from(slot.ids),
      overlapScore: slot.ids.size / denominator,
    })),
  };
}
