import assert from 'node:assert/strict';
import test from 'node:test';
import { DEFAULT_OPEN_DATA_BASE_URL } from '../connectors/openDataConnector';
import { DEFAULT_SCRAPER_SITES_CONFIG_PATH, loadSettings, validateSettings } from './settings';

test('loadSettings falls back to defaults for an empty environment', () => {
  const settings = loadSettings({});
  assert.deepEqual(settings, {
    openaiApiKey: '',
    openDataAppToken: '',
    openDataDatasetId: '',
    openDataBaseUrl: DEFAULT_OPEN_DATA_BASE_URL,
    scraperSitesConfigPath: DEFAULT_SCRAPER_SITES_CONFIG_PATH,
    ingestionMaxStalenessHours: 192,
    ingestionRequiredSourcesStrict: true,
    apiKey: '',
    firestoreProjectId: null,
  });
  assert.equal(Object.isFrozen(settings), true);
});

test('loadSettings reads trimmed values, numbers and flags', () => {
  const settings = loadSettings({
    OPENAI_API_KEY: ' test-secret ',
    API_KEY: 'test-token',
    INGESTION_MAX_STALENESS_HOURS: '24',
    INGESTION_REQUIRED_SOURCES_STRICT: 'no',
    FIRESTORE_PROJECT_ID: 'demo-project',
  });
  assert.equal(settings.openaiApiKey, 'test-secret');
  assert.equal(settings.apiKey, 'test-token');
  assert.equal(settings.ingestionMaxStalenessHours, 24);
  assert.equal(settings.ingestionRequiredSourcesStrict, false);
  assert.equal(settings.firestoreProjectId, 'demo-project');

  assert.equal(loadSettings({ INGESTION_MAX_STALENESS_HOURS: 'weekly' }).ingestionMaxStalenessHours, 192);
  assert.equal(loadSettings({ INGESTION_REQUIRED_SOURCES_STRICT: 'ON' }).ingestionRequiredSourcesStrict, true);
});

test('validateSettings names every missing production setting', () => {
  assert.deepEqual(validateSettings(loadSettings({ INGESTION_MAX_STALENESS_HOURS: '0' })), [
    'OPENAI_API_KEY is not set',
    'OPEN_DATA_APP_TOKEN is not set',
    'OPEN_DATA_DATASET_ID is not set',
    'INGESTION_MAX_STALENESS_HOURS must be positive',
  ]);
  assert.deepEqual(
    validateSettings(loadSettings({
      OPENAI_API_KEY: 'test-secret',
      OPEN_DATA_APP_TOKEN: 'test-token',
      OPEN_DATA_DATASET_ID: 'abcd-1234',
    })),
    [],
  );
});
