/**
 * Deadlines for language-model calls, so a slow provider degrades one ranking
 * or extraction stage instead of stalling the pipeline.
 */

import { OperationTimeoutError } from '../types/errors.js';

export const DEFAULT_TIMEOUTS = {
  /** Embedding a query or a batch of candidates */
  EMBEDDING: 15000,
  /** Scoring a rerank pool */
  RERANK: 30000,
  /** Assisted field extraction for one document */
  EXTRACTION: 45000,
} as const;

/**
 * Settle with the operation, or reject with OperationTimeoutError once the deadline passes.
 * The timer is always cleared, so no handle outlives the call.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
