/**
 * Service Initialization
 *
 * Builds the pipeline services once at startup: content store, extraction,
 * retrieval and ingestion, with the optional language-model capabilities
 * wired in where they are configured.
 */

import type { ContentStore } from '../services/content/ContentStore.js';
import { createContentStore } from '../services/content/createContentStore.js';
import { AssistedExtractor } from '../services/extraction/AssistedExtractor.js';
import { ExtractionEngine } from '../services/extraction/ExtractionEngine.js';
import { IngestionOrchestrator } from '../services/ingestion/IngestionOrchestrator.js';
import { OpenAIProvider } from '../services/llm/OpenAIProvider.js';
import { LLMRerankProvider } from '../services/retrieval/LLMRerankProvider.js';
import { OpenAIEmbeddingProvider } from '../services/retrieval/OpenAIEmbeddingProvider.js';
import { RetrievalEngine } from '../services/retrieval/RetrievalEngine.js';
import { logger } from '../utils/logger.js';
import { closeDB } from './database.js';
import { getEnv } from './env.js';
import { loadSeedConfig, type SeedConfig } from './seeds.js';

export interface PipelineServices {
  store: ContentStore;
  extraction: ExtractionEngine;
  retrieval: RetrievalEngine;
  orchestrator: IngestionOrchestrator;
  loadSeeds: () => Promise<SeedConfig>;
  close: () => Promise<void>;
}

export async function initializeServices(options: { store?: ContentStore } = {}): Promise<PipelineServices> {
  const env = getEnv();
  const store = options.store ?? (await createContentStore());

  const llm = new OpenAIProvider();
  const assisted = env.ASSISTED_EXTRACTION_ENABLED ? new AssistedExtractor(llm) : null;

  const extraction = new ExtractionEngine({ store, assisted });
  const retrieval = new RetrievalEngine({
    store,
    embedder: new OpenAIEmbeddingProvider(),
    reranker: new LLMRerankProvider(llm),
  });
  const orchestrator = new IngestionOrchestrator({ store, extraction });

  const stages = await retrieval.availableStages();
  logger.info(
    { store: store.driver, stages, assistedExtraction: assisted !== null },
    'Pipeline services initialized'
  );

  return {
    store,
    extraction,
    retrieval,
    orchestrator,
    loadSeeds: () => loadSeedConfig(env.SEEDS_FILE),
    close: async () => {
      if (store.driver === 'mongodb') {
        await closeDB();
      }
    },
  };
}
