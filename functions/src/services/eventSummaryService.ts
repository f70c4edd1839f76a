import type { TextGenerator } from '../classification/textGeneration';
import type { EventRecord } from '../models/event';

export const NO_EVENTS_SUMMARY = 'No events found.';
export const MAX_SUMMARY_EVENTS = 10;

const SUMMARY_SYSTEM_PROMPT =
  'You write short, friendly summaries of upcoming events for a group choosing what to do together.';

type SummarizableEvent = Pick<EventRecord, 'title' | 'dateStart' | 'location'>;

export function buildSummaryPrompt(events: readonly SummarizableEvent[]): string {
  const lines = events
    .slice(0, MAX_SUMMARY_EVENTS)
    .map(event => `- ${event.title} | ${event.dateStart ?? 'date TBD'} | ${event.location || 'location TBD'}`);
  return ['Summarize these events in a few sentences:', ...lines].join('\n');
}

export async function summarizeEvents(generator: TextGenerator, events: readonly SummarizableEvent[]): Promise<string> {
  if (events.length === 0) {
    return NO_EVENTS_SUMMARY;
  }
  return generator.generate(buildSummaryPrompt(events), { system: SUMMARY_SYSTEM_PROMPT });
}
