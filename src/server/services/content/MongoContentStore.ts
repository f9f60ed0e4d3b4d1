import { MongoServerError, type ClientSession, type Collection, type Db, type Filter, type WithId } from 'mongodb';
import type {
  DocumentInput,
  RecordInput,
  StoredDocument,
  StoredRecord,
  StoreStats,
} from '../../contracts/types.js';
import { DatabaseError, StoreConflictError, isAppError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errorHandling.js';
import type { ContentStore, PutDocumentResult, PutRecordOptions } from './ContentStore.js';
import { assertExpectedVersion, nextVersion } from './versioning.js';

const logger = createChildLogger({ component: 'MongoContentStore' });

export const DOCUMENTS_COLLECTION = 'documents';
export const RECORDS_COLLECTION = 'records';

const DUPLICATE_KEY = 11000;
const WRITE_CONFLICT = 112;

function toDocument(row: WithId<StoredDocument>): StoredDocument {
  const { _id, ...document } = row;
  return document;
}

function toRecord(row: WithId<StoredRecord>): StoredRecord {
  const { _id, ...record } = row;
  return record;
}

/**
 * Map a failed version flip to the store's error taxonomy. Lost races
 * (duplicate latest row, write conflict, transient transaction abort) become
 * StoreConflictError; anything else is a DatabaseError.
 */
export function toStoreError(error: unknown, context: Record<string, unknown>): Error {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof MongoServerError) {
    if (
      error.code === DUPLICATE_KEY ||
      error.code === WRITE_CONFLICT ||
      error.hasErrorLabel('TransientTransactionError')
    ) {
      return new StoreConflictError('Version flip lost a concurrent write', { ...context, mongoCode: error.code });
    }
  }
  return new DatabaseError(`Content store write failed: ${errorMessage(error)}`, context);
}

/**
 * MongoDB-backed store. Version flips run in a transaction, and a partial
 * unique index on the logical key (isLatest: true) rejects a second latest row.
 * Requires a replica set or sharded cluster for transactions.
 */
export class MongoContentStore implements ContentStore {
  readonly driver = 'mongodb' as const;
  private readonly documents: Collection<StoredDocument>;
  private readonly records: Collection<StoredRecord>;

  constructor(private readonly db: Db) {
    this.documents = db.collection<StoredDocument>(DOCUMENTS_COLLECTION);
    this.records = db.collection<StoredRecord>(RECORDS_COLLECTION);
  }

  /**
   * Ensure indexes exist for both collections
   */
  async ensureIndexes(): Promise<void> {
    await this.documents.createIndex(
      { url: 1 },
      { unique: true, partialFilterExpression: { isLatest: true }, name: 'idx_documents_latest_url' }
    );
    await this.documents.createIndex({ url: 1, version: 1 }, { unique: true, name: 'idx_documents_url_version' });
    await this.documents.createIndex({ topic: 1, isLatest: 1 }, { name: 'idx_documents_topic' });

    await this.records.createIndex(
      { key: 1 },
      { unique: true, partialFilterExpression: { isLatest: true }, name: 'idx_records_latest_key' }
    );
    await this.records.createIndex({ key: 1, version: 1 }, { unique: true, name: 'idx_records_key_version' });
    await this.records.createIndex({ topic: 1, category: 1, isLatest: 1 }, { name: 'idx_records_topic_category' });

    logger.info('Content store indexes ensured');
  }

  /**
   * Execute a function within a MongoDB transaction
   */
  async withTransaction<T>(fn: (session: ClientSession) => Promise<T>): Promise<T> {
    const session = this.db.client.startSession();

    try {
      session.startTransaction();
      const result = await fn(session);
      await session.commitTransaction();
      return result;
    } catch (error) {
      if (session.inTransaction()) {
        await session.abortTransaction();
      }
      throw error;
    } finally {
      await session.endSession();
    }
  }

  async putDocument(document: DocumentInput): Promise<PutDocumentResult> {
    try {
      return await this.withTransaction(async (session) => {
        const current = await this.documents.findOne({ url: document.url, isLatest: true }, { session });

        if (current && current.contentHash === document.contentHash) {
          return { document: toDocument(current), written: false };
        }

        const stored: StoredDocument = { ...document, version: nextVersion(current), isLatest: true };
        if (current) {
          const flipped = await this.documents.updateOne(
            { _id: current._id, isLatest: true },
            { $set: { isLatest: false } },
            { session }
          );
          if (flipped.modifiedCount !== 1) {
            throw new StoreConflictError(`Document '${document.url}' was superseded concurrently`, {
              url: document.url,
            });
          }
        }
        await this.documents.insertOne({ ...stored }, { session });
        return { document: stored, written: true };
      });
    } catch (error) {
      const storeError = toStoreError(error, { url: document.url });
      logger.error({ url: document.url, error: storeError.message }, 'Document version flip failed');
      throw storeError;
    }
  }

  async getLatestDocuments(topic?: string): Promise<StoredDocument[]> {
    const filter: Filter<StoredDocument> = topic === undefined ? { isLatest: true } : { isLatest: true, topic };
    const rows = await this.documents.find(filter).sort({ url: 1 }).toArray();
    return rows.map(toDocument);
  }

  async getDocumentHistory(url: string): Promise<StoredDocument[]> {
    const rows = await this.documents.find({ url }).sort({ version: 1 }).toArray();
    return rows.map(toDocument);
  }

  async putRecord(record: RecordInput, options: PutRecordOptions = {}): Promise<StoredRecord> {
    try {
      return await this.withTransaction(async (session) => {
        const current = await this.records.findOne({ key: record.key, isLatest: true }, { session });
        assertExpectedVersion(record.key, current, options.expectedVersion);

        const stored: StoredRecord = {
          ...record,
          version: nextVersion(current),
          isLatest: true,
          createdAt: new Date(),
        };
        if (current) {
          const flipped = await this.records.updateOne(
            { _id: current._id, isLatest: true },
            { $set: { isLatest: false } },
            { session }
          );
          if (flipped.modifiedCount !== 1) {
            throw new StoreConflictError(`Record '${record.key}' was superseded concurrently`, { key: record.key });
          }
        }
        await this.records.insertOne({ ...stored }, { session });
        return stored;
      });
    } catch (error) {
      const storeError = toStoreError(error, { key: record.key });
      logger.error({ key: record.key, error: storeError.message }, 'Record version flip failed');
      throw storeError;
    }
  }

  async getCurrentRecord(key: string): Promise<StoredRecord | null> {
    const row = await this.records.findOne({ key, isLatest: true });
    return row ? toRecord(row) : null;
  }

  async getLatestRecords(topic?: string, category?: string): Promise<StoredRecord[]> {
    const filter: Filter<StoredRecord> = { isLatest: true };
    if (topic !== undefined) filter.topic = topic;
    if (category !== undefined) filter.category = category;
    const rows = await this.records.find(filter).sort({ key: 1 }).toArray();
    return rows.map(toRecord);
  }

  async getRecordHistory(key: string): Promise<StoredRecord[]> {
    const rows = await this.records.find({ key }).sort({ version: 1 }).toArray();
    return rows.map(toRecord);
  }

  async listTopics(): Promise<string[]> {
    const [documentTopics, recordTopics] = await Promise.all([
      this.documents.distinct('topic'),
      this.records.distinct('topic'),
    ]);
    return [...new Set([...documentTopics, ...recordTopics])].sort();
  }

  async getStats(): Promise<StoreStats> {
    const [documents, latestDocuments, records, latestRecords, topics] = await Promise.all([
      this.documents.countDocuments(),
      this.documents.countDocuments({ isLatest: true }),
      this.records.countDocuments(),
      this.records.countDocuments({ isLatest: true }),
      this.listTopics(),
    ]);
    return { documents, latestDocuments, records, latestRecords, topics };
  }
}
