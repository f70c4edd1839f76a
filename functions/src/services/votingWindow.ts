/**
 * Monthly voting runs for the following month. It opens at 00:00 UTC on the
 * last Friday of the month and closes at the end of the 1st of the next
 * month, so on the 1st the previous month's window is still the current one.
 */
export interface VotingWindow {
  targetYear: number;
  targetMonth: number;
  opensAt: string;
  closesAt: string;
  deadlineLabel: string;
  isOpen: boolean;
}

const FRIDAY = 5;

export function getVotingWindow(now: Date): VotingWindow {
  let year = now.getUTCFullYear();
  let month = now.getUTCMonth() + 1;
  if (now.getUTCDate() === 1) {
    [year, month] = month === 1 ? [year - 1, 12] : [year, month - 1];
  }

  const [targetYear, targetMonth] = month === 12 ? [year + 1, 1] : [year, month + 1];
  const opens = new Date(Date.UTC(year, month - 1, lastFridayOfMonth(year, month)));
  const closes = new Date(Date.UTC(targetYear, targetMonth - 1, 1, 23, 59, 59, 999));

  return {
    targetYear,
    targetMonth,
    opensAt: opens.toISOString(),
    closesAt: closes.toISOString(),
    deadlineLabel: `${monthLabel(targetYear, targetMonth)} voting closes ${shortMonth(closes)} 1, 11:59 PM UTC`,
    isOpen: opens.getTime() <= now.getTime() && now.getTime() <= closes.getTime(),
  };
}

export function lastFridayOfMonth(year: number, month: number): number {
  const lastDay = new Date(Date.UTC(year, month, 0));
  const offset = (lastDay.getUTCDay() - FRIDAY + 7) % 7;
  return lastDay.getUTCDate() - offset;
}

export function monthLabel(year: number, month: number): string {
  return new Date(Date.UTC(year, month - 1, 1)).toLocaleString('en-US', {
    month: 'long',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

function shortMonth(date: Date): string {
  return date.toLocaleString('en-US', { month: 'short', timeZone: 'UTC' });
}
