import { existsSync, readFileSync } from 'fs';
import { isRecord } from '../models/event';

export interface SourceTarget {
  name: string;
  url: string;
  required: boolean;
  enabled: boolean;
}

export const DEFAULT_SCRAPED_SOURCES: readonly SourceTarget[] = [
  { name: 'secretnyc', url: 'https://secretnyc.co/', required: true, enabled: true },
  { name: 'timeout_newyork', url: 'https://www.timeout.com/newyork', required: true, enabled: true },
  { name: 'hiddennyc', url: 'https://hiddennyc.net/', required: true, enabled: true },
  { name: 'untappedcities', url: 'https://www.untappedcities.com/', required: true, enabled: true },
  {
    name: 'anisah_immersive',
    url: 'https://anisahauduevans.com/new-york-immersive-experiences-nyc/',
    required: true,
    enabled: true,
  },
  { name: 'fever_newyork', url: 'https://feverup.com/en/new-york', required: true, enabled: true },
];

/**
 * Loads `{ "sources": [...] }` from the config file when it exists, else the
 * built-in list. Entries without a name or url are dropped.
 */
export function loadSources(configPath: string): SourceTarget[] {
  const rawEntries = existsSync(configPath)
    ? readSourceEntries(configPath)
    : DEFAULT_SCRAPED_SOURCES;

  return rawEntries
    .map(coerceSource)
    .filter((target): target is SourceTarget => target !== null && target.name.length > 0 && target.url.length > 0);
}

function readSourceEntries(configPath: string): readonly unknown[] {
  const text = readFileSync(configPath, 'utf-8');
  let payload: unknown;
  try {
    payload = JSON.parse(text) as unknown;
  } catch (error) {
    throw new Error(`Invalid scraper source config at ${configPath}`, { cause: error });
  }

  if (!isRecord(payload) || !Array.isArray(payload.sources)) {
    return [];
  }
  return payload.sources;
}

function coerceSource(item: unknown): SourceTarget | null {
  if (!isRecord(item)) {
    return null;
  }
  return {
    name: typeof item.name === 'string' ? item.name.trim() : '',
    url: typeof item.url === 'string' ? item.url.trim() : '',
    required: typeof item.required === 'boolean' ? item.required : false,
    enabled: typeof item.enabled === 'boolean' ? item.enabled : true,
  };
}
