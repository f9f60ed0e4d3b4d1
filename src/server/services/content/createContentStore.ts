import { getEnv, type ContentStoreDriver } from '../../config/env.js';
import { connectDB } from '../../config/database.js';
import { logger } from '../../utils/logger.js';
import type { ContentStore } from './ContentStore.js';
import { InMemoryContentStore } from './InMemoryContentStore.js';
import { MongoContentStore } from './MongoContentStore.js';

/**
 * Build the configured content store. The MongoDB driver connects and
 * ensures its indexes before it is returned.
 */
export async function createContentStore(driver: ContentStoreDriver = getEnv().CONTENT_STORE): Promise<ContentStore> {
  if (driver === 'memory') {
    logger.warn('Using in-memory content store; data is lost when the process exits');
    return new InMemoryContentStore();
  }

  const db = await connectDB();
  const store = new MongoContentStore(db);
  await store.ensureIndexes();
  return store;
}
