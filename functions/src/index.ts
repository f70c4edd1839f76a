import * as functions from 'firebase-functions/v1';
import type { Express, Request, Response } from 'express';
import { createApiApp } from './api/routes';
import { describeError, readQueryString } from './api/requestParsers';
import { loadSettings, validateSettings } from './config/settings';
import { buildIngestionDependencies, createRuntime, type Runtime } from './runtime';
import { runIngestion } from './workers/ingestionRun';

const INGESTION_TIME_ZONE = 'America/New_York';
const SECRETS = ['OPENAI_API_KEY', 'OPEN_DATA_APP_TOKEN', 'API_KEY'];

// Secrets are only readable once an invocation starts, so the runtime is built lazily.
function runtimeFromEnvironment(): Runtime {
  const settings = loadSettings();
  for (const problem of validateSettings(settings)) {
    console.warn(`[INGESTION] config_warning ${problem}`);
  }
  return createRuntime(settings);
}

export const scheduledIngestion = functions
  .runWith({
    timeoutSeconds: 540,
    memory: '512MB',
    secrets: SECRETS,
  })
  .pubsub
  .schedule('0 6 * * *')
  .timeZone(INGESTION_TIME_ZONE)
  .onRun(async () => {
    try {
      const outcome = await runIngestion(buildIngestionDependencies(runtimeFromEnvironment()));
      console.log(`[INGESTION] scheduled outcome=${JSON.stringify(outcome)}`);
    } catch (error) {
      console.error('[INGESTION] scheduled run crashed', error);
    }
    return null;
  });

export const triggerIngestion = functions
  .runWith({
    timeoutSeconds: 540,
    memory: '512MB',
    secrets: SECRETS,
  })
  .https.onRequest(async (req: Request, res: Response) => {
    const runtime = runtimeFromEnvironment();
    if (!runtime.settings.apiKey || req.get('x-api-key') !== runtime.settings.apiKey) {
      res.status(403).json({ error: 'Forbidden', message: 'Invalid or missing API key' });
      return;
    }

    const force = readQueryString(req.query.force)?.toLowerCase() === 'true';
    try {
      const outcome = await runIngestion(buildIngestionDependencies(runtime), { force });
      res.status(outcome.status === 'failed' ? 500 : 200).json(outcome);
    } catch (error) {
      console.error('[INGESTION] triggered run crashed', error);
      res.status(500).json({ error: describeError(error) });
    }
  });

let apiApp: Express | null = null;

export const api = functions
  .runWith({
    timeoutSeconds: 60,
    memory: '256MB',
    secrets: SECRETS,
  })
  .https.onRequest((req: Request, res: Response) => {
    if (!apiApp) {
      apiApp = createApiApp(runtimeFromEnvironment());
    }
    apiApp(req, res);
  });
