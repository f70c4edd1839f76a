import { DEFAULT_OPEN_DATA_BASE_URL } from '../connectors/openDataConnector';
import { DEFAULT_MAX_STALENESS_HOURS } from '../workers/ingestionRun';

export const DEFAULT_SCRAPER_SITES_CONFIG_PATH = 'config/scraper_sites.json';

export interface Settings {
  openaiApiKey: string;
  openDataAppToken: string;
  openDataDatasetId: string;
  openDataBaseUrl: string;
  scraperSitesConfigPath: string;
  ingestionMaxStalenessHours: number;
  ingestionRequiredSourcesStrict: boolean;
  apiKey: string;
  firestoreProjectId: string | null;
}

type Environment = Record<string, string | undefined>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function loadSettings(env: Environment = process.env): Readonly<Settings> {
  return Object.freeze({
    openaiApiKey: readText(env.OPENAI_API_KEY),
    openDataAppToken: readText(env.OPEN_DATA_APP_TOKEN),
    openDataDatasetId: readText(env.OPEN_DATA_DATASET_ID),
    openDataBaseUrl: readText(env.OPEN_DATA_BASE_URL) || DEFAULT_OPEN_DATA_BASE_URL,
    scraperSitesConfigPath: readText(env.SCRAPER_SITES_CONFIG_PATH) || DEFAULT_SCRAPER_SITES_CONFIG_PATH,
    ingestionMaxStalenessHours: readNumber(env.INGESTION_MAX_STALENESS_HOURS, DEFAULT_MAX_STALENESS_HOURS),
    ingestionRequiredSourcesStrict: readFlag(env.INGESTION_REQUIRED_SOURCES_STRICT, true),
    apiKey: readText(env.API_KEY),
    firestoreProjectId: readText(env.FIRESTORE_PROJECT_ID) || null,
  });
}

/**
 * Problems that would make a production run misbehave. Empty when ready.
 */
export function validateSettings(settings: Readonly<Settings>): string[] {
  const problems: string[] = [];
  if (!settings.openaiApiKey) {
    problems.push('OPENAI_API_KEY is not set');
  }
  if (!settings.openDataAppToken) {
    problems.push('OPEN_DATA_APP_TOKEN is not set');
  }
  if (!settings.openDataDatasetId) {
    problems.push('OPEN_DATA_DATASET_ID is not set');
  }
  if (!(settings.ingestionMaxStalenessHours > 0)) {
    problems.push('INGESTION_MAX_STALENESS_HOURS must be positive');
  }
  return problems;
}

function readText(value: string | undefined): string {
  return value?.trim() ?? '';
}

function readNumber(value: string | undefined, fallback: number): number {
  const text = readText(value);
  if (!text) {
    return fallback;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readFlag(value: string | undefined, fallback: boolean): boolean {
  const text = readText(value).toLowerCase();
  if (!text) {
    return fallback;
  }
  return TRUTHY.has(text);
}
