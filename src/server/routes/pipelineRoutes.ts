import express from 'express';
import { z } from 'zod';
import type { SeedConfig } from '../config/seeds.js';
import type { ExtractionSummary } from '../contracts/types.js';
import type { ContentStore } from '../services/content/ContentStore.js';
import type { ExtractionEngine } from '../services/extraction/ExtractionEngine.js';
import type { IngestionOrchestrator } from '../services/ingestion/IngestionOrchestrator.js';
import type { RetrievalEngine } from '../services/retrieval/RetrievalEngine.js';
import { NotFoundError } from '../types/errors.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { normalizeUrl } from '../utils/urlNormalizer.js';
import { commonSchemas, validate } from '../middleware/validation.js';

export interface PipelineRouteDeps {
  store: ContentStore;
  retrieval: Pick<RetrievalEngine, 'retrieve' | 'availableStages'>;
  extraction: Pick<ExtractionEngine, 'extractTopic'>;
  orchestrator: Pick<IngestionOrchestrator, 'run'>;
  loadSeeds: () => Promise<SeedConfig>;
}

const crawlBodySchema = z.object({
  topics: z.array(commonSchemas.nonEmptyString).optional(),
});

const extractBodySchema = z.object({
  topic: commonSchemas.optionalString,
});

const contextBodySchema = z.object({
  query: commonSchemas.nonEmptyString,
  topic: commonSchemas.optionalString,
  category: commonSchemas.optionalString,
  maxItems: z.number().int().min(1).max(50).optional(),
});

const recordsQuerySchema = z.object({
  topic: commonSchemas.optionalString,
  category: commonSchemas.optionalString,
});

const documentHistoryQuerySchema = z.object({
  url: commonSchemas.url,
});

const recordHistoryQuerySchema = z.object({
  key: commonSchemas.nonEmptyString,
});

type CrawlBody = z.infer<typeof crawlBodySchema>;
type ExtractBody = z.infer<typeof extractBodySchema>;
type ContextBody = z.infer<typeof contextBodySchema>;

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createPipelineRouter(deps: PipelineRouteDeps): express.Router {
  const router = express.Router();

  /**
   * GET /api/health
   * Store driver and the ranking stages available to retrieval
   */
  router.get('/health', asyncHandler(async (_req, res) => {
    res.json({
      status: 'ok',
      store: deps.store.driver,
      stages: await deps.retrieval.availableStages(),
    });
  }));

  /**
   * POST /api/crawl
   * Crawl the configured seed topics (all, or those named) and extract them
   */
  router.post('/crawl', validate({ body: crawlBodySchema }), asyncHandler(async (req, res) => {
    const body: CrawlBody = req.body;
    const seeds = await deps.loadSeeds();
    res.json(await deps.orchestrator.run(seeds, { topics: body.topics }));
  }));

  /**
   * POST /api/extract
   * Re-run extraction over stored documents without crawling
   */
  router.post('/extract', validate({ body: extractBodySchema }), asyncHandler(async (req, res) => {
    const body: ExtractBody = req.body;
    const topics = body.topic ? [body.topic] : await deps.store.listTopics();
    const extraction: ExtractionSummary[] = [];
    for (const topic of topics) {
      extraction.push(await deps.extraction.extractTopic(topic));
    }
    res.json({ extraction });
  }));

  /**
   * POST /api/context
   * Ranked, citation-tagged context bundle for a query
   */
  router.post('/context', validate({ body: contextBodySchema }), asyncHandler(async (req, res) => {
    const body: ContextBody = req.body;
    const bundle = await deps.retrieval.retrieve(body.query, {
      topic: body.topic,
      category: body.category,
      maxItems: body.maxItems,
    });
    res.json(bundle);
  }));

  router.get('/records', validate({ query: recordsQuerySchema }), asyncHandler(async (req, res) => {
    const records = await deps.store.getLatestRecords(queryString(req.query.topic), queryString(req.query.category));
    res.json({ records });
  }));

  router.get('/records/history', validate({ query: recordHistoryQuerySchema }), asyncHandler(async (req, res) => {
    const key = queryString(req.query.key) ?? '';
    const versions = await deps.store.getRecordHistory(key);
    if (versions.length === 0) {
      throw new NotFoundError('Record', key);
    }
    res.json({ key, versions });
  }));

  router.get('/documents/history', validate({ query: documentHistoryQuerySchema }), asyncHandler(async (req, res) => {
    const requested = queryString(req.query.url) ?? '';
    const url = normalizeUrl(requested) ?? requested;
    const versions = await deps.store.getDocumentHistory(url);
    if (versions.length === 0) {
      throw new NotFoundError('Document', url);
    }
    res.json({ url, versions });
  }));

  router.get('/stats', asyncHandler(async (_req, res) => {
    res.json(await deps.store.getStats());
  }));

  return router;
}
