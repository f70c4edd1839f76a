import type { EmbeddingProvider } from '../classification/embeddings';
import { isSourceFetchError } from '../connectors/errors';
import { OPEN_DATA_SOURCE_NAME } from '../connectors/openDataConnector';
import type { SourceTarget } from '../connectors/sourceConfig';
import type { SourceConnector } from '../connectors/types';
import type { EventInput, OpenDataRawEvent, ScrapedRawEvent } from '../models/event';
import {
  truncateErrorText,
  type IngestionRun,
  type SourceCheck,
  type SourceCheckStatus,
  type TerminalRunStatus,
} from '../models/ingestion';
import { normalizeOpenDataEvents } from '../normalizers/openDataNormalizer';
import { normalizeScrapedEvents } from '../normalizers/scrapedEventNormalizer';
import type { EventRepository } from '../services/eventStore';
import type { IngestionRunRepository } from '../services/ingestionRunStore';
import type { VectorIndex } from '../services/vectorIndex';
import { upsertEvents, type UpsertStats } from './sourceIngest';

export const DEFAULT_MAX_STALENESS_HOURS = 192;
export const OPEN_DATA_NOT_CONFIGURED = 'open data dataset id not configured';

export interface IngestionDependencies {
  events: EventRepository;
  runs: IngestionRunRepository;
  /** Null when the open data API is not configured. */
  openData: SourceConnector<OpenDataRawEvent> | null;
  loadSources: () => SourceTarget[];
  createScraper: (target: SourceTarget) => SourceConnector<ScrapedRawEvent>;
  embeddings?: EmbeddingProvider | null;
  vectorIndex?: VectorIndex | null;
  maxStalenessHours: number;
  requiredSourcesStrict: boolean;
  now?: () => Date;
}

export interface IngestionOptions {
  force?: boolean;
}

export type IngestionOutcome =
  | { status: 'skipped'; reason: 'fresh_enough'; eventsUpserted: 0 }
  | { status: 'success'; runId: number; eventsUpserted: number }
  | { status: 'degraded' | 'failed'; runId: number; eventsUpserted: number; requiredFailed: string[] }
  | { status: 'failed'; runId: number; eventsUpserted: number; errors: string[] };

interface SourceDescriptor {
  name: string;
  url: string;
  required: boolean;
}

interface RunProgress {
  runId: number;
  eventsUpserted: number;
  requiredFailed: string[];
}

/**
 * True when there is no completed run, its finish time is unreadable, or it
 * finished at least `maxStalenessHours` ago.
 */
export function shouldRefresh(latest: IngestionRun | null, maxStalenessHours: number, now: Date): boolean {
  if (!latest?.finishedAt) {
    return true;
  }
  const finishedAt = Date.parse(latest.finishedAt);
  if (Number.isNaN(finishedAt)) {
    return true;
  }
  const ageHours = (now.getTime() - finishedAt) / 3_600_000;
  return ageHours >= maxStalenessHours;
}

export function resolveRunStatus(requiredFailed: readonly string[], strict: boolean): TerminalRunStatus {
  if (requiredFailed.length === 0) {
    return 'success';
  }
  return strict ? 'failed' : 'degraded';
}

/**
 * One ingestion pass: staleness gate, open data API, then every configured
 * page, one source at a time. The run is finalized exactly once.
 */
export async function runIngestion(
  deps: IngestionDependencies,
  options: IngestionOptions = {},
): Promise<IngestionOutcome> {
  const now = deps.now ?? (() => new Date());

  if (!options.force) {
    const latest = await deps.runs.latestCompletedRun();
    if (!shouldRefresh(latest, deps.maxStalenessHours, now())) {
      console.log(`[INGESTION] skip reason=fresh_enough last_run=${latest?.id ?? 'none'}`);
      return { status: 'skipped', reason: 'fresh_enough', eventsUpserted: 0 };
    }
  }

  const run = await deps.runs.createRun();
  const progress: RunProgress = { runId: run.id, eventsUpserted: 0, requiredFailed: [] };
  let finalized = false;
  console.log(`[INGESTION] run_started run_id=${run.id} force=${Boolean(options.force)}`);

  try {
    await ingestOpenData(deps, progress);

    for (const target of deps.loadSources()) {
      await ingestScrapedSource(deps, progress, target);
    }

    const requiredFailed = Array.from(new Set(progress.requiredFailed)).sort();
    const status = resolveRunStatus(requiredFailed, deps.requiredSourcesStrict);
    const errorSummary = requiredFailed.length > 0
      ? `required source failures: ${requiredFailed.join(', ')}`
      : '';

    finalized = true;
    await deps.runs.finalizeRun(run.id, {
      status,
      totalEventsUpserted: progress.eventsUpserted,
      errorSummary,
    });
    console.log(
      `[INGESTION] run_finished run_id=${run.id} status=${status} events_upserted=${progress.eventsUpserted}`,
    );

    if (status === 'success') {
      return { status, runId: run.id, eventsUpserted: progress.eventsUpserted };
    }
    return {
      status,
      runId: run.id,
      eventsUpserted: progress.eventsUpserted,
      requiredFailed,
    };
  } catch (error) {
    if (finalized) {
      throw error;
    }
    const message = describeError(error);
    console.error(`[INGESTION] run_failed run_id=${run.id}`, error);
    finalized = true;
    await deps.runs.finalizeRun(run.id, {
      status: 'failed',
      totalEventsUpserted: progress.eventsUpserted,
      errorSummary: truncateErrorText(message),
    });
    return { status: 'failed', runId: run.id, eventsUpserted: progress.eventsUpserted, errors: [message] };
  }
}

async function ingestOpenData(deps: IngestionDependencies, progress: RunProgress): Promise<void> {
  const connector = deps.openData;
  if (!connector) {
    await recordCheck(deps, progress, {
      name: OPEN_DATA_SOURCE_NAME,
      url: '',
      required: true,
    }, 'skipped', 0, OPEN_DATA_NOT_CONFIGURED);
    return;
  }

  await ingestSource(
    deps,
    progress,
    { name: connector.sourceName, url: connector.sourceUrl, required: true },
    async () => normalizeOpenDataEvents(await connector.fetchRawEvents()),
  );
}

async function ingestScrapedSource(deps: IngestionDependencies, progress: RunProgress, target: SourceTarget): Promise<void> {
  if (!target.enabled) {
    await recordCheck(deps, progress, target, 'skipped', 0, 'disabled', { exempt: true });
    return;
  }

  const connector = deps.createScraper(target);
  await ingestSource(
    deps,
    progress,
    target,
    async () => normalizeScrapedEvents(await connector.fetchRawEvents()),
  );
}

async function ingestSource(
  deps: IngestionDependencies,
  progress: RunProgress,
  source: SourceDescriptor,
  loadInputs: () => Promise<EventInput[]>,
): Promise<void> {
  let inputs: EventInput[];
  try {
    inputs = await loadInputs();
  } catch (error) {
    const reason = isSourceFetchError(error) ? 'fetch_error' : 'unexpected_error';
    console.error(`[INGESTION] source=${source.name} status=failed reason=${reason}`, error);
    await recordCheck(deps, progress, source, 'failed', 0, describeError(error));
    return;
  }

  const stats = await upsertEvents(deps, source.name, inputs);
  progress.eventsUpserted += stats.inserted;
  const status: SourceCheckStatus = stats.inserted > 0 ? 'success' : 'partial';
  await recordCheck(deps, progress, source, status, stats.inserted, describeStats(stats));
}

export function describeStats(stats: Pick<UpsertStats, 'inserted' | 'skippedInvalidDate' | 'skippedUpsertError'>): string {
  const parts: string[] = [];
  if (stats.inserted === 0) {
    parts.push('no events extracted');
  }
  if (stats.skippedInvalidDate > 0) {
    parts.push(`skipped_invalid_date=${stats.skippedInvalidDate}`);
  }
  if (stats.skippedUpsertError > 0) {
    parts.push(`skipped_upsert_error=${stats.skippedUpsertError}`);
  }
  return parts.join('; ');
}

async function recordCheck(
  deps: IngestionDependencies,
  progress: RunProgress,
  source: SourceDescriptor,
  status: SourceCheckStatus,
  eventsFound: number,
  error: string,
  policy: { exempt?: boolean } = {},
): Promise<void> {
  const check: SourceCheck = {
    runId: progress.runId,
    sourceName: source.name,
    sourceUrl: source.url,
    required: source.required,
    status,
    eventsFound,
    error: truncateErrorText(error),
  };
  await deps.runs.recordSourceCheck(check);

  // Disabled sources are skipped on purpose and never fail the run.
  const policyFailure = source.required && !policy.exempt && (status === 'failed' || status === 'skipped');
  if (policyFailure) {
    progress.requiredFailed.push(source.name);
  }
  console.log(
    `[INGESTION] source=${source.name} status=${status} events_found=${eventsFound} required=${source.required}${error ? ` error=${JSON.stringify(error)}` : ''}`,
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
