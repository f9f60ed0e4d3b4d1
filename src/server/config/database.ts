import { MongoClient, MongoNetworkError, MongoServerError, type Db } from 'mongodb';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errorHandling.js';
import { DatabaseError } from '../types/errors.js';
import { getEnv } from './env.js';

export type { Db };

const logger = createChildLogger({ component: 'database' });

export interface ConnectRetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_CONNECT_RETRY: ConnectRetryPolicy = { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 10000 };

// HostUnreachable, HostNotFound, NetworkTimeout, ShutdownInProgress,
// InterruptedAtShutdown, InterruptedDueToReplStateChange
const TRANSIENT_SERVER_CODES = new Set([6, 7, 89, 91, 11600, 11602]);

/**
 * Connection failures worth another attempt: network trouble, timeouts and
 * replica-set transitions. Auth and configuration errors are not retried.
 */
export function isTransientConnectError(error: unknown): boolean {
  if (error instanceof MongoNetworkError) return true;
  if (error instanceof MongoServerError && typeof error.code === 'number') {
    return TRANSIENT_SERVER_CODES.has(error.code);
  }
  if (!(error instanceof Error)) return false;
  const text = `${error.name} ${error.message}`.toLowerCase();
  return ['network', 'timeout', 'timed out', 'econnrefused'].some(marker => text.includes(marker));
}

/**
 * Delay before retry number `retry` (1-based): doubling from the initial delay, capped
 */
export function connectBackoffMs(retry: number, policy: ConnectRetryPolicy = DEFAULT_CONNECT_RETRY): number {
  return Math.min(policy.initialDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

let client: MongoClient | null = null;
let db: Db | null = null;

function createClient(): MongoClient {
  const env = getEnv();
  return new MongoClient(env.MONGODB_URI, {
    maxPoolSize: 10,
    minPoolSize: 1,
    connectTimeoutMS: env.DB_CONNECT_TIMEOUT_MS,
    serverSelectionTimeoutMS: env.DB_CONNECT_TIMEOUT_MS,
    // Version flips run in transactions, which need majority acknowledgement
    writeConcern: { w: 'majority' },
    readConcern: { level: 'majority' },
    // Absent optional record fields must stay absent, not become null
    ignoreUndefined: true,
  });
}

/**
 * Connect once per process; later calls reuse the handle
 */
export async function connectDB(policy: ConnectRetryPolicy = DEFAULT_CONNECT_RETRY): Promise<Db> {
  if (db) {
    return db;
  }

  const { DB_NAME } = getEnv();
  for (let retry = 0; ; retry++) {
    if (retry > 0) {
      const delay = connectBackoffMs(retry, policy);
      logger.warn({ retry, maxRetries: policy.maxRetries, delay }, 'Retrying MongoDB connection');
      await new Promise(resolve => setTimeout(resolve, delay));
    }

    try {
      if (!client) {
        client = createClient();
      }
      await client.connect();
      const connected = client.db(DB_NAME);
      await connected.command({ ping: 1 });
      db = connected;
      logger.info({ dbName: DB_NAME, attempts: retry + 1 }, 'Connected to MongoDB');
      return connected;
    } catch (error) {
      const transient = isTransientConnectError(error);
      if (!transient || retry >= policy.maxRetries) {
        logger.error({ error: errorMessage(error), attempts: retry + 1, transient }, 'MongoDB connection failed');
        throw new DatabaseError(`MongoDB connection failed: ${errorMessage(error)}`, { dbName: DB_NAME, attempts: retry + 1 });
      }
      logger.warn({ error: errorMessage(error), attempt: retry + 1 }, 'MongoDB connection attempt failed');
    }
  }
}

export async function closeDB(): Promise<void> {
  const closing = client;
  client = null;
  db = null;
  if (!closing) {
    return;
  }
  await closing.close();
  logger.info('MongoDB connection closed');
}
