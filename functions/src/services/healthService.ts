import type { EventRepository } from './eventStore';
import type { VectorIndex } from './vectorIndex';

export interface ReadinessDependencies {
  events: Pick<EventRepository, 'listEvents'>;
  vectorIndex?: Pick<VectorIndex, 'count'> | null;
}

export interface ReadinessReport {
  ok: boolean;
  database: string;
  vectorIndex: string;
}

/**
 * Touches each backing store once. Only the event database gates readiness;
 * a missing or failing vector index degrades search to the plain listing.
 */
export async function checkReadiness(deps: ReadinessDependencies): Promise<ReadinessReport> {
  let database = 'ready';
  try {
    await deps.events.listEvents({ limit: 1 });
  } catch (error) {
    console.error('[API] Event store readiness check failed', error);
    database = `error: ${errorMessage(error)}`;
  }

  let vectorIndex = 'degraded: unavailable';
  if (deps.vectorIndex) {
    try {
      await deps.vectorIndex.count();
      vectorIndex = 'ready';
    } catch (error) {
      console.warn('[API] Vector index readiness check failed', error);
      vectorIndex = `degraded: ${errorMessage(error)}`;
    }
  }

  return { ok: database === 'ready', database, vectorIndex };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
