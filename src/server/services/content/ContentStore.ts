import type { ContentStoreDriver } from '../../config/env.js';
import type {
  DocumentInput,
  RecordInput,
  StoredDocument,
  StoredRecord,
  StoreStats,
} from '../../contracts/types.js';

export interface PutDocumentResult {
  document: StoredDocument;
  /** False when the latest version already had the same content hash */
  written: boolean;
}

export interface PutRecordOptions {
  /**
   * Version the caller read before computing this record (0 when it saw none).
   * A mismatch with the stored latest version raises StoreConflictError.
   */
  expectedVersion?: number;
}

/**
 * Versioned, append-only persistence for documents and records.
 *
 * Each logical key (document URL, record key) has exactly one latest row.
 * Writing a new version flips the previous latest row to superseded and
 * inserts the new one in one atomic step; history is never deleted.
 */
export interface ContentStore {
  readonly driver: ContentStoreDriver;

  putDocument(document: DocumentInput): Promise<PutDocumentResult>;
  getLatestDocuments(topic?: string): Promise<StoredDocument[]>;
  /** All versions of one URL, oldest first */
  getDocumentHistory(url: string): Promise<StoredDocument[]>;

  putRecord(record: RecordInput, options?: PutRecordOptions): Promise<StoredRecord>;
  getCurrentRecord(key: string): Promise<StoredRecord | null>;
  getLatestRecords(topic?: string, category?: string): Promise<StoredRecord[]>;
  /** All versions of one record key, oldest first */
  getRecordHistory(key: string): Promise<StoredRecord[]>;

  listTopics(): Promise<string[]>;
  getStats(): Promise<StoreStats>;
}

/**
 * Write-side slice the crawl frontier needs
 */
export type DocumentSink = Pick<ContentStore, 'putDocument'>;
