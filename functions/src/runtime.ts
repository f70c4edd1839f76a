import type { Firestore } from 'firebase-admin/firestore';
import { OpenAIEmbeddingProvider, type EmbeddingProvider } from './classification/embeddings';
import { OpenAIChatTextGenerator, type TextGenerator } from './classification/textGeneration';
import type { Settings } from './config/settings';
import { OpenDataConnector } from './connectors/openDataConnector';
import { createDefaultStrategyRegistry, type ScrapeStrategyRegistry } from './connectors/scrapers/registry';
import { loadSources } from './connectors/sourceConfig';
import { WebPageConnector } from './connectors/webPageConnector';
import { getFirestore } from './firebase/admin';
import { FirestoreEventStore, type EventRepository } from './services/eventStore';
import { FirestoreIngestionRunStore, type IngestionRunRepository } from './services/ingestionRunStore';
import { FirestoreVectorIndex, type VectorIndex } from './services/vectorIndex';
import type { IngestionDependencies } from './workers/ingestionRun';

/**
 * Everything a request handler or an ingestion run needs, built once per
 * process and passed down explicitly.
 */
export interface Runtime {
  settings: Readonly<Settings>;
  events: EventRepository;
  runs: IngestionRunRepository;
  embeddings: EmbeddingProvider | null;
  vectorIndex: VectorIndex | null;
  textGenerator: TextGenerator | null;
  strategies: ScrapeStrategyRegistry;
}

export function createRuntime(settings: Readonly<Settings>, options: { firestore?: Firestore } = {}): Runtime {
  const db = options.firestore ?? getFirestore(settings.firestoreProjectId ?? undefined);
  const embeddings = settings.openaiApiKey
    ? new OpenAIEmbeddingProvider({ apiKey: settings.openaiApiKey })
    : null;

  return {
    settings,
    events: new FirestoreEventStore(db),
    runs: new FirestoreIngestionRunStore(db),
    embeddings,
    vectorIndex: embeddings ? new FirestoreVectorIndex(db) : null,
    textGenerator: settings.openaiApiKey ? new OpenAIChatTextGenerator({ apiKey: settings.openaiApiKey }) : null,
    strategies: createDefaultStrategyRegistry(),
  };
}

export function buildIngestionDependencies(runtime: Runtime): IngestionDependencies {
  const { settings } = runtime;
  return {
    events: runtime.events,
    runs: runtime.runs,
    openData: settings.openDataDatasetId
      ? new OpenDataConnector({
          datasetId: settings.openDataDatasetId,
          appToken: settings.openDataAppToken,
          baseUrl: settings.openDataBaseUrl,
        })
      : null,
    loadSources: () => loadSources(settings.scraperSitesConfigPath),
    createScraper: target => new WebPageConnector({
      target,
      strategy: runtime.strategies.resolve(target.name),
    }),
    embeddings: runtime.embeddings,
    vectorIndex: runtime.vectorIndex,
    maxStalenessHours: settings.ingestionMaxStalenessHours,
    requiredSourcesStrict: settings.ingestionRequiredSourcesStrict,
  };
}
