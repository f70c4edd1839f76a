import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { createApiKeyValidator } from '../middleware/auth';
import { isRecord, type EventRecord } from '../models/event';
import type { Runtime } from '../runtime';
import { aggregateAvailability } from '../services/availabilityService';
import { curateVotingEvents, DEFAULT_CURATION_TOP_N } from '../services/curationService';
import { loadPreferences } from '../services/adminPreferences';
import { searchEvents } from '../services/eventSearch';
import { checkReadiness } from '../services/healthService';
import { MAX_EVENT_LIST_LIMIT } from '../services/eventStore';
import { summarizeEvents } from '../services/eventSummaryService';
import {
  buildOverlapByEvent,
  computeRecommendations,
  DEFAULT_RECOMMENDATION_TOP_N,
} from '../services/recommendationService';
import { getVotingWindow } from '../services/votingWindow';
import {
  describeError,
  parseAvailabilityRows,
  parseBooleanParam,
  parseEventIds,
  parseEventNumberMap,
  parseOptionalDate,
  parseOptionalInteger,
  parseOptionalNumber,
  parseParticipantCount,
  parseTagList,
  parseWeights,
  readQueryString,
  RequestValidationError,
} from './requestParsers';

export type ApiRuntime = Pick<
  Runtime,
  'settings' | 'events' | 'runs' | 'embeddings' | 'vectorIndex' | 'textGenerator'
> & {
  now?: () => Date;
};

export function createApiApp(runtime: ApiRuntime): Express {
  const app = express();
  const now = runtime.now ?? (() => new Date());

  app.use(cors({ origin: true }));
  app.use(express.json());
  app.use(createApiKeyValidator(runtime.settings.apiKey));

  app.get('/status', async (_req: Request, res: Response): Promise<void> => {
    const readiness = await checkReadiness(runtime);
    res.status(readiness.ok ? 200 : 503).json({
      status: readiness.ok ? 'healthy' : 'unhealthy',
      dependencies: { database: readiness.database, vectorIndex: readiness.vectorIndex },
      services: {
        eventIngestion: 'enabled',
        semanticSearch: runtime.embeddings && runtime.vectorIndex ? 'enabled' : 'disabled',
        summaries: runtime.textGenerator ? 'enabled' : 'disabled',
      },
      timestamp: now().toISOString(),
    });
  });

  app.get('/events', async (req: Request, res: Response): Promise<void> => {
    try {
      const events = await searchEvents(runtime, {
        query: readQueryString(req.query.q) ?? null,
        dateStart: parseOptionalDate(req.query.start, 'start'),
        dateEnd: parseOptionalDate(req.query.end, 'end'),
        priceMax: parseOptionalNumber(req.query.priceMax, 'priceMax'),
        tags: parseTagList(req.query.tags),
        limit: parseOptionalInteger(req.query.limit, 'limit', { min: 1, max: MAX_EVENT_LIST_LIMIT }) ?? undefined,
      });

      const body: { events: EventRecord[]; count: number; summary?: string | null } = {
        events,
        count: events.length,
      };
      if (parseBooleanParam(req.query.summary, false)) {
        body.summary = runtime.textGenerator ? await summarizeEvents(runtime.textGenerator, events) : null;
      }
      res.json(body);
    } catch (error) {
      sendError(res, 'GET /events', error);
    }
  });

  app.get('/events/curated', async (req: Request, res: Response): Promise<void> => {
    try {
      let targetYear = parseOptionalInteger(req.query.year, 'year', { min: 1970, max: 9999 });
      let targetMonth = parseOptionalInteger(req.query.month, 'month', { min: 1, max: 12 });
      const websitesOnly = parseBooleanParam(req.query.websitesOnly, true);
      const topN = parseOptionalInteger(req.query.limit, 'limit', { min: 1, max: 100 }) ?? DEFAULT_CURATION_TOP_N;

      const currentTime = now();
      const votingWindow = getVotingWindow(currentTime);
      if (targetYear === null && targetMonth === null) {
        targetYear = votingWindow.targetYear;
        targetMonth = votingWindow.targetMonth;
      }

      const events = await runtime.events.listAllEvents();
      const curated = curateVotingEvents(events, { targetYear, targetMonth, websitesOnly, topN, now: currentTime });
      res.json({ events: curated, count: curated.length, votingWindow });
    } catch (error) {
      sendError(res, 'GET /events/curated', error);
    }
  });

  app.get('/voting/window', (_req: Request, res: Response) => {
    res.json(getVotingWindow(now()));
  });

  app.post('/recommendations', async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new RequestValidationError('Request body must be a JSON object');
      }

      const eventIds = parseEventIds(body.eventIds);
      const events = eventIds
        ? await runtime.events.getEventsByIds(eventIds)
        : await runtime.events.listAllEvents();
      const votes = parseEventNumberMap(body.votes, 'votes');

      let overlap = new Map<number, number>();
      if (body.overlap !== undefined && body.overlap !== null) {
        overlap = parseEventNumberMap(body.overlap, 'overlap');
      } else if (isRecord(body.availability)) {
        const rows = parseAvailabilityRows(body.availability.rows);
        const participantCount = parseParticipantCount(
          body.availability.participantCount,
          new Set(rows.map(row => row.participantId)).size,
        );
        overlap = buildOverlapByEvent(events, aggregateAvailability(rows, participantCount));
      }

      const recommendations = computeRecommendations(events, votes, overlap, loadPreferences(body.preferences), {
        weights: parseWeights(body.weights),
        topN: parseOptionalInteger(body.limit, 'limit', { min: 1, max: 50 }) ?? DEFAULT_RECOMMENDATION_TOP_N,
      });
      res.json({ recommendations, count: recommendations.length });
    } catch (error) {
      sendError(res, 'POST /recommendations', error);
    }
  });

  app.post('/availability/overlap', (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new RequestValidationError('Request body must be a JSON object');
      }
      const rows = parseAvailabilityRows(body.rows);
      const participantCount = parseParticipantCount(
        body.participantCount,
        new Set(rows.map(row => row.participantId)).size,
      );
      res.json(aggregateAvailability(rows, participantCount));
    } catch (error) {
      sendError(res, 'POST /availability/overlap', error);
    }
  });

  app.get('/ingestion/latest', async (_req: Request, res: Response): Promise<void> => {
    try {
      const run = await runtime.runs.latestCompletedRun();
      if (!run) {
        res.status(404).json({ error: 'No completed ingestion run' });
        return;
      }
      const sourceChecks = await runtime.runs.listSourceChecks(run.id);
      res.json({ run, sourceChecks });
    } catch (error) {
      sendError(res, 'GET /ingestion/latest', error);
    }
  });

  return app;
}

function sendError(res: Response, route: string, error: unknown): void {
  if (error instanceof RequestValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  console.error(`[API] ${route} failed`, error);
  res.status(500).json({ error: describeError(error) });
}
