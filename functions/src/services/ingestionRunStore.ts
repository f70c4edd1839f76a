import { Timestamp, type DocumentData, type Firestore } from 'firebase-admin/firestore';
import {
  truncateErrorText,
  type IngestionRun,
  type IngestionRunStatus,
  type RunFinalization,
  type SourceCheck,
  type SourceCheckStatus,
} from '../models/ingestion';
import { COUNTERS_COLLECTION, readTimestamp } from './eventStore';

export const INGESTION_RUNS_COLLECTION = 'ingestionRuns';
export const SOURCE_CHECKS_COLLECTION = 'sourceChecks';
const RUNS_COUNTER_DOC = 'ingestionRuns';

export interface IngestionRunRepository {
  createRun(): Promise<IngestionRun>;
  /** Moves a running run to its terminal state. Rejects any other transition. */
  finalizeRun(runId: number, finalization: RunFinalization): Promise<IngestionRun>;
  recordSourceCheck(check: SourceCheck): Promise<void>;
  /** Most recently finished run whose status is success or degraded. */
  latestCompletedRun(): Promise<IngestionRun | null>;
  listSourceChecks(runId: number): Promise<SourceCheck[]>;
}

export class IngestionRunStateError extends Error {
  readonly runId: number;

  constructor(runId: number, message: string) {
    super(message);
    this.name = 'IngestionRunStateError';
    this.runId = runId;
  }
}

export function applyFinalization(run: IngestionRun, finalization: RunFinalization, finishedAt: string): IngestionRun {
  if (run.status !== 'running') {
    throw new IngestionRunStateError(run.id, `Ingestion run ${run.id} is already ${run.status}`);
  }
  return {
    ...run,
    status: finalization.status,
    finishedAt,
    totalEventsUpserted: finalization.totalEventsUpserted,
    errorSummary: truncateErrorText(finalization.errorSummary),
  };
}

export function normalizeSourceCheck(check: SourceCheck): SourceCheck {
  return {
    ...check,
    eventsFound: Math.max(0, Math.floor(check.eventsFound)),
    error: truncateErrorText(check.error),
  };
}

export class FirestoreIngestionRunStore implements IngestionRunRepository {
  private readonly db: Firestore;
  private readonly now: () => Date;

  constructor(db: Firestore, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  async createRun(): Promise<IngestionRun> {
    const counterRef = this.db.collection(COUNTERS_COLLECTION).doc(RUNS_COUNTER_DOC);
    const startedAt = this.now().toISOString();

    return this.db.runTransaction(async transaction => {
      const counter = await transaction.get(counterRef);
      const next = counter.data()?.next;
      const id = typeof next === 'number' && Number.isInteger(next) && next > 0 ? next : 1;
      const run: IngestionRun = {
        id,
        startedAt,
        finishedAt: null,
        status: 'running',
        totalEventsUpserted: 0,
        errorSummary: '',
      };
      transaction.set(counterRef, { next: id + 1 }, { merge: true });
      transaction.set(this.runRef(id), toRunDocument(run));
      return run;
    });
  }

  async finalizeRun(runId: number, finalization: RunFinalization): Promise<IngestionRun> {
    const runRef = this.runRef(runId);
    const finishedAt = this.now().toISOString();

    return this.db.runTransaction(async transaction => {
      const snapshot = await transaction.get(runRef);
      const run = fromRunDocument(snapshot.data());
      if (!run) {
        throw new IngestionRunStateError(runId, `Ingestion run ${runId} not found`);
      }
      const finalized = applyFinalization(run, finalization, finishedAt);
      transaction.set(runRef, toRunDocument(finalized));
      return finalized;
    });
  }

  async recordSourceCheck(check: SourceCheck): Promise<void> {
    const normalized = normalizeSourceCheck(check);
    await this.runRef(check.runId).collection(SOURCE_CHECKS_COLLECTION).add({
      ...normalized,
      recordedAt: Timestamp.fromDate(this.now()),
    });
  }

  async latestCompletedRun(): Promise<IngestionRun | null> {
    const snapshot = await this.db
      .collection(INGESTION_RUNS_COLLECTION)
      .where('status', 'in', ['success', 'degraded'])
      .orderBy('finishedAt', 'desc')
      .limit(1)
      .get();
    const [doc] = snapshot.docs;
    return doc ? fromRunDocument(doc.data()) : null;
  }

  async listSourceChecks(runId: number): Promise<SourceCheck[]> {
    const snapshot = await this.runRef(runId)
      .collection(SOURCE_CHECKS_COLLECTION)
      .orderBy('recordedAt')
      .get();
    return snapshot.docs.flatMap(doc => {
      const check = fromSourceCheckDocument(doc.data());
      return check ? [check] : [];
    });
  }

  private runRef(runId: number) {
    return this.db.collection(INGESTION_RUNS_COLLECTION).doc(String(runId));
  }
}

const RUN_STATUSES: readonly IngestionRunStatus[] = ['running', 'success', 'degraded', 'failed'];
const CHECK_STATUSES: readonly SourceCheckStatus[] = ['success', 'partial', 'failed', 'skipped'];

function isRunStatus(value: unknown): value is IngestionRunStatus {
  return typeof value === 'string' && (RUN_STATUSES as readonly string[]).includes(value);
}

function isCheckStatus(value: unknown): value is SourceCheckStatus {
  return typeof value === 'string' && (CHECK_STATUSES as readonly string[]).includes(value);
}

function toRunDocument(run: IngestionRun): DocumentData {
  return {
    id: run.id,
    startedAt: Timestamp.fromDate(new Date(run.startedAt)),
    finishedAt: run.finishedAt ? Timestamp.fromDate(new Date(run.finishedAt)) : null,
    status: run.status,
    totalEventsUpserted: run.totalEventsUpserted,
    errorSummary: run.errorSummary,
  };
}

function fromRunDocument(data: DocumentData | undefined): IngestionRun | null {
  if (!data || typeof data.id !== 'number' || !isRunStatus(data.status)) {
    return null;
  }
  return {
    id: data.id,
    startedAt: readTimestamp(data.startedAt),
    finishedAt: data.finishedAt === null || data.finishedAt === undefined ? null : readTimestamp(data.finishedAt),
    status: data.status,
    totalEventsUpserted: typeof data.totalEventsUpserted === 'number' ? data.totalEventsUpserted : 0,
    errorSummary: typeof data.errorSummary === 'string' ? data.errorSummary : '',
  };
}

function fromSourceCheckDocument(data: DocumentData): SourceCheck | null {
  if (typeof data.runId !== 'number' || !isCheckStatus(data.status)) {
    return null;
  }
  return {
    runId: data.runId,
    sourceName: typeof data.sourceName === 'string' ? data.sourceName : '',
    sourceUrl: typeof data.sourceUrl === 'string' ? data.sourceUrl : '',
    required: data.required === true,
    status: data.status,
    eventsFound: typeof data.eventsFound === 'number' ? data.eventsFound : 0,
    error: typeof data.error === 'string' ? data.error : '',
  };
}
