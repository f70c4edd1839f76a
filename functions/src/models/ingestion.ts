export type IngestionRunStatus = 'running' | 'success' | 'degraded' | 'failed';

export type TerminalRunStatus = Exclude<IngestionRunStatus, 'running'>;

export type SourceCheckStatus = 'success' | 'partial' | 'failed' | 'skipped';

export const MAX_ERROR_TEXT_LENGTH = 1000;

export interface IngestionRun {
  id: number;
  startedAt: string;
  finishedAt: string | null;
  status: IngestionRunStatus;
  totalEventsUpserted: number;
  errorSummary: string;
}

export interface RunFinalization {
  status: TerminalRunStatus;
  totalEventsUpserted: number;
  errorSummary: string;
}

export interface SourceCheck {
  runId: number;
  sourceName: string;
  sourceUrl: string;
  required: boolean;
  status: SourceCheckStatus;
  eventsFound: number;
  error: string;
}

export function truncateErrorText(value: string): string {
  return value.length > MAX_ERROR_TEXT_LENGTH ? value.slice(0, MAX_ERROR_TEXT_LENGTH) : value;
}

export function isCompletedRunStatus(status: IngestionRunStatus): boolean {
  return status === 'success' || status === 'degraded';
}
