import type { ClassificationConfig, ExtractionConfig } from '../../../src/server/config/extraction/extractionConfig.js';
import { InMemoryContentStore } from '../../../src/server/services/content/InMemoryContentStore.js';
import { ExtractionEngine, type FieldAssistant } from '../../../src/server/services/extraction/ExtractionEngine.js';
import { StoreConflictError } from '../../../src/server/types/errors.js';
import { documentInput } from '../../helpers/fakeSite.js';

const CLASSIFICATION: ClassificationConfig = {
  categories: [
    { name: 'work', keywords: ['work permit', 'employer', 'skilled'] },
    { name: 'study', keywords: ['study permit', 'university', 'tuition'] },
  ],
  generalKeywords: ['immigration', 'residence', 'citizenship'],
  minCategoryMatches: 2,
  minGeneralMatches: 2,
};

const CONFIG: ExtractionConfig = {
  classification: CLASSIFICATION,
  summaryMaxLength: 300,
  maxKeyPoints: 5,
  minTextLength: 100,
};

const ELIGIBILITY_URL = 'https://example.org/skilled-worker/eligibility';
const FEES_URL = 'https://example.org/skilled-worker/fees';
const KEY = 'skilled-worker-visa::canada';

const ELIGIBILITY_TEXT =
  'Skilled workers with a job offer from an approved employer can apply for a work permit. ' +
  'Applicants must be at least 18 years old.';
const FEES_TEXT =
  'The skilled worker route requires sponsorship by an employer. ' +
  'Applicants must be under 45 years of age. The application fee is $100.';

async function seedSkilledWorker(store: InMemoryContentStore): Promise<void> {
  await store.putDocument(
    documentInput({
      url: ELIGIBILITY_URL,
      title: 'Skilled Worker Visa - Eligibility',
      text: ELIGIBILITY_TEXT,
      fetchedAt: new Date('2026-01-01T00:00:00Z'),
    })
  );
  await store.putDocument(
    documentInput({
      url: FEES_URL,
      title: 'Skilled Worker Visa - Fees',
      text: FEES_TEXT,
      fetchedAt: new Date('2026-01-02T00:00:00Z'),
    })
  );
}

describe('ExtractionEngine', () => {
  it('merges fields from two pages about the same programme into one record', async () => {
    const store = new InMemoryContentStore();
    await seedSkilledWorker(store);
    const engine = new ExtractionEngine({ store, config: CONFIG });

    const summary = await engine.extractTopic('canada');

    expect(summary).toEqual({ topic: 'canada', processed: 2, extracted: 2, skipped: 0, errored: 0, recordsWritten: 2 });
    const record = await store.getCurrentRecord(KEY);
    expect(record).toMatchObject({
      key: KEY,
      kind: 'categorized',
      name: 'Skilled Worker Visa',
      category: 'work',
      version: 2,
      fields: { ageMin: 18, ageMax: 45, fee: '$100' },
      sourceUrls: [ELIGIBILITY_URL, FEES_URL],
    });
    expect((await store.getRecordHistory(KEY)).map(row => row.isLatest)).toEqual([false, true]);
  });

  it('writes no new versions when re-run over unchanged documents', async () => {
    const store = new InMemoryContentStore();
    await seedSkilledWorker(store);
    const engine = new ExtractionEngine({ store, config: CONFIG });

    await engine.extractTopic('canada');
    const rerun = await engine.extractTopic('canada');

    expect(rerun).toMatchObject({ extracted: 2, recordsWritten: 0 });
    expect(await store.getRecordHistory(KEY)).toHaveLength(2);
  });

  it('skips short and low-confidence documents', async () => {
    const store = new InMemoryContentStore();
    await store.putDocument(documentInput({ url: 'https://example.org/short', title: 'Short', text: 'Too short.' }));
    await store.putDocument(
      documentInput({
        url: 'https://example.org/news',
        title: 'Office news',
        text:
          'The office moved to a new building this spring. The opening hours changed for the summer period. ' +
          'Visitors should check the notice board at the entrance before coming in.',
      })
    );
    const engine = new ExtractionEngine({ store, config: CONFIG });

    const summary = await engine.extractTopic('canada');

    expect(summary).toMatchObject({ processed: 2, extracted: 0, skipped: 2, recordsWritten: 0 });
    expect(await store.getLatestRecords()).toEqual([]);
  });

  it('stores general pages as summary records', async () => {
    const store = new InMemoryContentStore();
    await store.putDocument(
      documentInput({
        url: 'https://example.org/residence',
        title: 'Permanent Residence - Overview',
        text:
          'Permanent residence gives you the right to live and work in the country. ' +
          'Immigration officers assess each application. Citizenship can follow after 3 years.',
      })
    );
    const engine = new ExtractionEngine({ store, config: CONFIG });

    await engine.extractTopic('canada');

    const record = await store.getCurrentRecord('permanent-residence::canada');
    expect(record).toMatchObject({
      kind: 'general',
      category: 'general',
      fields: {
        summary:
          'Permanent residence gives you the right to live and work in the country. ' +
          'Immigration officers assess each application. Citizenship can follow after 3 years.',
      },
    });
    expect(record?.fields.keyPoints).toBeUndefined();
  });

  it('prefers assisted fields over rule-based ones', async () => {
    const store = new InMemoryContentStore();
    await seedSkilledWorker(store);
    const assisted: FieldAssistant = {
      isAvailable: async () => true,
      extract: async () => ({ ageMin: 21, education: 'masters' }),
    };
    const engine = new ExtractionEngine({ store, config: CONFIG, assisted });

    await engine.extractTopic('canada');

    expect((await store.getCurrentRecord(KEY))?.fields).toEqual({
      ageMin: 21,
      education: 'masters',
      ageMax: 45,
      fee: '$100',
    });
  });

  it('counts documents whose record write fails', async () => {
    class FailingStore extends InMemoryContentStore {
      async getCurrentRecord(): Promise<null> {
        throw new Error('store offline');
      }
    }
    const store = new FailingStore();
    await seedSkilledWorker(store);
    const engine = new ExtractionEngine({ store, config: CONFIG });

    const summary = await engine.extractTopic('canada');

    expect(summary).toMatchObject({ processed: 2, extracted: 2, errored: 2, recordsWritten: 0 });
  });

  it('rejects when a record version flip conflicts', async () => {
    class ConflictingStore extends InMemoryContentStore {
      async putRecord(): Promise<never> {
        throw new StoreConflictError('Record was superseded concurrently', { key: KEY });
      }
    }
    const store = new ConflictingStore();
    await seedSkilledWorker(store);
    const engine = new ExtractionEngine({ store, config: CONFIG });

    await expect(engine.extractTopic('canada')).rejects.toThrow(StoreConflictError);
    await expect(store.getCurrentRecord(KEY)).resolves.toBeNull();
  });
});
