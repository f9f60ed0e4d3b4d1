import type {
  DocumentInput,
  RecordInput,
  StoredDocument,
  StoredRecord,
  StoreStats,
} from '../../contracts/types.js';
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { createChildLogger } from '../../utils/logger.js';
import type { ContentStore, PutDocumentResult, PutRecordOptions } from './ContentStore.js';
import { assertExpectedVersion, nextVersion } from './versioning.js';

const logger = createChildLogger({ component: 'InMemoryContentStore' });

function latestOf<T extends { isLatest: boolean }>(history: T[] | undefined): T | null {
  return history?.find(row => row.isLatest) ?? null;
}

/**
 * Process-local store used for tests and single-run CLI ingestion.
 * Writers for the same key are serialized with a keyed mutex.
 */
export class InMemoryContentStore implements ContentStore {
  readonly driver = 'memory' as const;
  private documents = new Map<string, StoredDocument[]>();
  private records = new Map<string, StoredRecord[]>();
  private mutex = new KeyedMutex();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async putDocument(document: DocumentInput): Promise<PutDocumentResult> {
    return this.mutex.runExclusive(`doc:${document.url}`, async () => {
      const history = this.documents.get(document.url) ?? [];
      const current = latestOf(history);

      if (current && current.contentHash === document.contentHash) {
        return { document: structuredClone(current), written: false };
      }

      const stored: StoredDocument = {
        ...structuredClone(document),
        version: nextVersion(current),
        isLatest: true,
      };
      if (current) {
        current.isLatest = false;
      }
      history.push(stored);
      this.documents.set(document.url, history);

      logger.debug({ url: document.url, version: stored.version }, 'Stored document version');
      return { document: structuredClone(stored), written: true };
    });
  }

  async getLatestDocuments(topic?: string): Promise<StoredDocument[]> {
    const latest: StoredDocument[] = [];
    for (const history of this.documents.values()) {
      const current = latestOf(history);
      if (current && (topic === undefined || current.topic === topic)) {
        latest.push(structuredClone(current));
      }
    }
    return latest.sort((a, b) => a.url.localeCompare(b.url));
  }

  async getDocumentHistory(url: string): Promise<StoredDocument[]> {
    return (this.documents.get(url) ?? []).map(row => structuredClone(row));
  }

  async putRecord(record: RecordInput, options: PutRecordOptions = {}): Promise<StoredRecord> {
    return this.mutex.runExclusive(`rec:${record.key}`, async () => {
      const history = this.records.get(record.key) ?? [];
      const current = latestOf(history);
      assertExpectedVersion(record.key, current, options.expectedVersion);

      const stored: StoredRecord = {
        ...structuredClone(record),
        version: nextVersion(current),
        isLatest: true,
        createdAt: this.now(),
      };
      if (current) {
        current.isLatest = false;
      }
      history.push(stored);
      this.records.set(record.key, history);

      logger.debug({ key: record.key, version: stored.version }, 'Stored record version');
      return structuredClone(stored);
    });
  }

  async getCurrentRecord(key: string): Promise<StoredRecord | null> {
    const current = latestOf(this.records.get(key));
    return current ? structuredClone(current) : null;
  }

  async getLatestRecords(topic?: string, category?: string): Promise<StoredRecord[]> {
    const latest: StoredRecord[] = [];
    for (const history of this.records.values()) {
      const current = latestOf(history);
      if (!current) continue;
      if (topic !== undefined && current.topic !== topic) continue;
      if (category !== undefined && current.category !== category) continue;
      latest.push(structuredClone(current));
    }
    return latest.sort((a, b) => a.key.localeCompare(b.key));
  }

  async getRecordHistory(key: string): Promise<StoredRecord[]> {
    return (this.records.get(key) ?? []).map(row => structuredClone(row));
  }

  async listTopics(): Promise<string[]> {
    const topics = new Set<string>();
    for (const history of this.documents.values()) {
      for (const row of history) topics.add(row.topic);
    }
    for (const history of this.records.values()) {
      for (const row of history) topics.add(row.topic);
    }
    return [...topics].sort();
  }

  async getStats(): Promise<StoreStats> {
    let documents = 0;
    let latestDocuments = 0;
    for (const history of this.documents.values()) {
      documents += history.length;
      latestDocuments += history.filter(row => row.isLatest).length;
    }
    let records = 0;
    let latestRecords = 0;
    for (const history of this.records.values()) {
      records += history.length;
      latestRecords += history.filter(row => row.isLatest).length;
    }
    return { documents, latestDocuments, records, latestRecords, topics: await this.listTopics() };
  }
}
