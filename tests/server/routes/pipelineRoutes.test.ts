import request from 'supertest';
import { createApp } from '../../../src/server/app.js';
import { parseSeedConfig, type SeedConfig } from '../../../src/server/config/seeds.js';
import type { ExtractionSummary } from '../../../src/server/contracts/types.js';
import { InMemoryContentStore } from '../../../src/server/services/content/InMemoryContentStore.js';
import type { IngestionRunOptions, IngestionRunResult } from '../../../src/server/services/ingestion/IngestionOrchestrator.js';
import { RetrievalEngine } from '../../../src/server/services/retrieval/RetrievalEngine.js';
import { documentInput } from '../../helpers/fakeSite.js';

const SEEDS = parseSeedConfig([
  { topic: 'canada', seedUrls: ['https://example.org/canada'], crawlPolicy: { requiredKeywords: ['visa'] } },
]);

const DOC_URL = 'https://example.org/visa/work';
const RECORD_KEY = 'skilled-worker-visa::canada';

function emptyExtraction(topic: string): ExtractionSummary {
  return { topic, processed: 0, extracted: 0, skipped: 0, errored: 0, recordsWritten: 0 };
}

async function setup(options: { runError?: Error } = {}) {
  const store = new InMemoryContentStore();
  await store.putDocument(documentInput({ url: DOC_URL, title: 'Work visa', text: 'Work visa overview.' }));
  await store.putRecord({
    key: RECORD_KEY,
    kind: 'categorized',
    name: 'Skilled Worker Visa',
    topic: 'canada',
    category: 'work',
    fields: { ageMin: 18, fee: '$100' },
    sourceUrls: [DOC_URL],
  });

  const runs: Array<{ seeds: SeedConfig; options: IngestionRunOptions | undefined }> = [];
  const extractedTopics: string[] = [];
  const app = createApp({
    store,
    retrieval: new RetrievalEngine({
      store,
      config: { semanticWeight: 0.6, keywordWeight: 0.4, rerankPoolSize: 20, maxItems: 5, tokenBudget: 3000 },
    }),
    extraction: {
      extractTopic: async topic => {
        extractedTopics.push(topic);
        return emptyExtraction(topic);
      },
    },
    orchestrator: {
      run: async (seeds, runOptions): Promise<IngestionRunResult> => {
        if (options.runError) throw options.runError;
        runs.push({ seeds, options: runOptions });
        return { crawl: [], extraction: [emptyExtraction('canada')] };
      },
    },
    loadSeeds: async () => SEEDS,
  });
  return { app, store, runs, extractedTopics };
}

describe('pipeline routes', () => {
  it('GET /api/health reports the store driver and ranking stages', async () => {
    const { app } = await setup();

    const response = await request(app).get('/api/health').expect(200);

    expect(response.body).toEqual({ status: 'ok', store: 'memory', stages: ['keyword'] });
  });

  describe('POST /api/context', () => {
    it('returns the ranked context bundle', async () => {
      const { app } = await setup();

      const response = await request(app)
        .post('/api/context')
        .send({ query: 'skilled worker visa', topic: 'canada' })
        .expect(200);

      expect(response.body).toMatchObject({
        query: 'skilled worker visa',
        stagesApplied: ['keyword'],
        citations: [{ sourceUrl: DOC_URL, provenanceType: 'categorized-record' }],
      });
      expect(response.body.items).toHaveLength(1);
      expect(response.body.text).toBe(
        '=== PROGRAMMES ===\n\n[1] Skilled Worker Visa (canada, work)\nAge: 18+\nFee: $100\n' +
          `Sources (categorized-record): ${DOC_URL}`
      );
    });

    it('rejects an empty query', async () => {
      const { app } = await setup();

      const response = await request(app).post('/api/context').send({ query: '   ' }).expect(400);

      expect(response.body).toMatchObject({
        error: 'BadRequestError',
        code: 'BAD_REQUEST',
        message: 'Validation failed',
        statusCode: 400,
        context: { details: [{ path: 'query', message: 'String cannot be empty' }] },
      });
    });

    it('rejects a body that is not valid JSON', async () => {
      const { app } = await setup();

      const response = await request(app)
        .post('/api/context')
        .set('Content-Type', 'application/json')
        .send('{"query": ')
        .expect(400);

      expect(response.body).toMatchObject({ code: 'BAD_REQUEST', message: 'Request body is not valid JSON' });
    });

    it('rejects an out-of-range item limit', async () => {
      const { app } = await setup();

      const response = await request(app).post('/api/context').send({ query: 'visa', maxItems: 0 }).expect(400);

      expect(response.body.context.details[0].path).toBe('maxItems');
    });
  });

  it('POST /api/crawl runs the orchestrator over the loaded seeds', async () => {
    const { app, runs } = await setup();

    const response = await request(app).post('/api/crawl').send({ topics: ['canada'] }).expect(200);

    expect(response.body).toEqual({ crawl: [], extraction: [emptyExtraction('canada')] });
    expect(runs).toEqual([{ seeds: SEEDS, options: { topics: ['canada'] } }]);
  });

  it('POST /api/extract covers every stored topic when none is named', async () => {
    const { app, extractedTopics } = await setup();

    const response = await request(app).post('/api/extract').send({}).expect(200);

    expect(response.body).toEqual({ extraction: [emptyExtraction('canada')] });
    expect(extractedTopics).toEqual(['canada']);
  });

  it('GET /api/records filters by topic', async () => {
    const { app } = await setup();

    const matching = await request(app).get('/api/records').query({ topic: 'canada' }).expect(200);
    const other = await request(app).get('/api/records').query({ topic: 'uk' }).expect(200);

    expect(matching.body.records.map((record: { key: string }) => record.key)).toEqual([RECORD_KEY]);
    expect(other.body).toEqual({ records: [] });
  });

  it('GET /api/records/history lists the versions of a record', async () => {
    const { app } = await setup();

    const response = await request(app).get('/api/records/history').query({ key: RECORD_KEY }).expect(200);

    expect(response.body.key).toBe(RECORD_KEY);
    expect(response.body.versions).toHaveLength(1);
    expect(response.body.versions[0]).toMatchObject({ version: 1, isLatest: true });
  });

  it('GET /api/documents/history normalizes the url before the lookup', async () => {
    const { app } = await setup();

    const response = await request(app)
      .get('/api/documents/history')
      .query({ url: 'https://Example.org/visa/work/#top' })
      .expect(200);

    expect(response.body.url).toBe(DOC_URL);
    expect(response.body.versions[0]).toMatchObject({ url: DOC_URL, version: 1, title: 'Work visa' });
  });

  it('answers 404 for unknown history keys', async () => {
    const { app } = await setup();

    const response = await request(app).get('/api/records/history').query({ key: 'missing::canada' }).expect(404);

    expect(response.body).toMatchObject({
      code: 'NOT_FOUND',
      message: "Record with identifier 'missing::canada' not found",
    });
  });

  it('GET /api/stats reports store counts', async () => {
    const { app } = await setup();

    const response = await request(app).get('/api/stats').expect(200);

    expect(response.body).toEqual({ documents: 1, latestDocuments: 1, records: 1, latestRecords: 1, topics: ['canada'] });
  });

  it('answers 404 for unknown routes', async () => {
    const { app } = await setup();

    const response = await request(app).get('/api/unknown').expect(404);

    expect(response.body).toMatchObject({
      error: 'NotFoundError',
      code: 'NOT_FOUND',
      message: "Route with identifier 'GET /api/unknown' not found",
    });
  });

  it('hides the details of unexpected errors', async () => {
    const { app } = await setup({ runError: new Error('connection pool exhausted') });

    const response = await request(app).post('/api/crawl').send({}).expect(500);

    expect(response.body).toMatchObject({
      error: 'Internal Server Error',
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
    expect(response.body.context).toBeUndefined();
  });
});
