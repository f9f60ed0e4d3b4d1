import type { RecordInput } from '../../../src/server/contracts/types.js';
import { InMemoryContentStore } from '../../../src/server/services/content/InMemoryContentStore.js';
import { StoreConflictError } from '../../../src/server/types/errors.js';
import { documentInput } from '../../helpers/fakeSite.js';

const URL_A = 'https://example.org/visa/a';

function recordInput(overrides: Partial<RecordInput> = {}): RecordInput {
  return {
    key: 'skilled-worker::canada',
    kind: 'categorized',
    name: 'Skilled Worker',
    topic: 'canada',
    category: 'work',
    fields: { ageMin: 18 },
    sourceUrls: [URL_A],
    ...overrides,
  };
}

describe('InMemoryContentStore', () => {
  describe('documents', () => {
    it('supersedes the previous version when the content changes', async () => {
      const store = new InMemoryContentStore();

      const first = await store.putDocument(documentInput({ url: URL_A, text: 'one', contentHash: 'h1' }));
      const second = await store.putDocument(documentInput({ url: URL_A, text: 'two', contentHash: 'h2' }));

      expect(first).toMatchObject({ written: true, document: { version: 1, isLatest: true } });
      expect(second).toMatchObject({ written: true, document: { version: 2, isLatest: true } });

      const history = await store.getDocumentHistory(URL_A);
      expect(history.map(row => [row.version, row.isLatest, row.text])).toEqual([
        [1, false, 'one'],
        [2, true, 'two'],
      ]);
      expect((await store.getLatestDocuments()).map(row => row.text)).toEqual(['two']);
    });

    it('does not write a version when the content hash is unchanged', async () => {
      const store = new InMemoryContentStore();
      await store.putDocument(documentInput({ url: URL_A, contentHash: 'same' }));

      const again = await store.putDocument(documentInput({ url: URL_A, contentHash: 'same' }));

      expect(again).toMatchObject({ written: false, document: { version: 1 } });
      expect(await store.getDocumentHistory(URL_A)).toHaveLength(1);
    });

    it('filters latest documents by topic', async () => {
      const store = new InMemoryContentStore();
      await store.putDocument(documentInput({ url: 'https://example.org/b', topic: 'canada' }));
      await store.putDocument(documentInput({ url: 'https://example.org/a', topic: 'australia' }));

      expect((await store.getLatestDocuments('canada')).map(row => row.url)).toEqual(['https://example.org/b']);
      expect((await store.getLatestDocuments()).map(row => row.url)).toEqual([
        'https://example.org/a',
        'https://example.org/b',
      ]);
    });

    it('returns copies that callers cannot mutate', async () => {
      const store = new InMemoryContentStore();
      const { document } = await store.putDocument(documentInput({ url: URL_A }));
      document.isLatest = false;

      const [latest] = await store.getLatestDocuments();
      expect(latest?.isLatest).toBe(true);
    });

    it('keeps one latest row per URL under concurrent writes', async () => {
      const store = new InMemoryContentStore();

      await Promise.all(
        Array.from({ length: 10 }, (_, i) => store.putDocument(documentInput({ url: URL_A, contentHash: `h${i}` })))
      );

      const history = await store.getDocumentHistory(URL_A);
      expect(history).toHaveLength(10);
      expect(history.filter(row => row.isLatest)).toHaveLength(1);
      expect(history.map(row => row.version)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });
  });

  describe('records', () => {
    it('stamps versions and creation time', async () => {
      const createdAt = new Date('2026-02-02T00:00:00Z');
      const store = new InMemoryContentStore({ now: () => createdAt });

      const stored = await store.putRecord(recordInput());

      expect(stored).toEqual({ ...recordInput(), version: 1, isLatest: true, createdAt });
      expect(await store.getCurrentRecord('skilled-worker::canada')).toEqual(stored);
      expect(await store.getCurrentRecord('missing::canada')).toBeNull();
    });

    it('rejects a write computed against a stale version', async () => {
      const store = new InMemoryContentStore();
      await store.putRecord(recordInput(), { expectedVersion: 0 });

      await expect(store.putRecord(recordInput({ fields: { ageMin: 21 } }), { expectedVersion: 0 })).rejects.toBeInstanceOf(
        StoreConflictError
      );
      await expect(store.putRecord(recordInput({ fields: { ageMin: 21 } }), { expectedVersion: 1 })).resolves.toMatchObject({
        version: 2,
      });
    });

    it('lets exactly one of several racing writers with the same expected version win', async () => {
      const store = new InMemoryContentStore();

      const results = await Promise.allSettled(
        [18, 19, 20].map(ageMin => store.putRecord(recordInput({ fields: { ageMin } }), { expectedVersion: 0 }))
      );

      expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
      const history = await store.getRecordHistory('skilled-worker::canada');
      expect(history).toHaveLength(1);
      expect(history[0]?.isLatest).toBe(true);
    });

    it('keeps one latest row per key when unconditioned writes race', async () => {
      const store = new InMemoryContentStore();

      await Promise.all([1, 2, 3, 4, 5].map(n => store.putRecord(recordInput({ fields: { experienceYears: n } }))));

      const history = await store.getRecordHistory('skilled-worker::canada');
      expect(history.filter(row => row.isLatest)).toHaveLength(1);
      expect(history.map(row => row.version)).toEqual([1, 2, 3, 4, 5]);
    });

    it('filters latest records by topic and category', async () => {
      const store = new InMemoryContentStore();
      await store.putRecord(recordInput());
      await store.putRecord(recordInput({ key: 'student::canada', name: 'Student', category: 'study' }));
      await store.putRecord(recordInput({ key: 'student::australia', name: 'Student', topic: 'australia', category: 'study' }));

      expect((await store.getLatestRecords('canada')).map(row => row.key)).toEqual([
        'skilled-worker::canada',
        'student::canada',
      ]);
      expect((await store.getLatestRecords(undefined, 'study')).map(row => row.key)).toEqual([
        'student::australia',
        'student::canada',
      ]);
      expect(await store.getLatestRecords('canada', 'family')).toEqual([]);
    });
  });

  it('lists topics and counts rows', async () => {
    const store = new InMemoryContentStore();
    await store.putDocument(documentInput({ url: URL_A, topic: 'canada', contentHash: 'h1' }));
    await store.putDocument(documentInput({ url: URL_A, topic: 'canada', contentHash: 'h2' }));
    await store.putRecord(recordInput({ topic: 'australia', key: 'skilled-worker::australia' }));

    expect(await store.getStats()).toEqual({
      documents: 2,
      latestDocuments: 1,
      records: 1,
      latestRecords: 1,
      topics: ['australia', 'canada'],
    });
  });
});
