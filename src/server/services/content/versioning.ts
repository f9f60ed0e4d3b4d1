/**
 * Append-only version state machine
 *
 * A row is either `current` (isLatest) or `superseded`. The only transition
 * is supersede-and-insert: the current row for a key becomes superseded and a
 * new current row with version + 1 is inserted, atomically.
 */

import { StoreConflictError } from '../../types/errors.js';

export type VersionState = 'current' | 'superseded';

export interface Versioned {
  version: number;
  isLatest: boolean;
}

export function versionState(row: Versioned): VersionState {
  return row.isLatest ? 'current' : 'superseded';
}

/**
 * Version number for the row replacing `current` (1 when there is none)
 */
export function nextVersion(current: Versioned | null): number {
  return current ? current.version + 1 : 1;
}

/**
 * Reject a write computed against a stale read
 *
 * @throws {StoreConflictError} when the caller's expected version is not the stored one
 */
export function assertExpectedVersion(
  key: string,
  current: Versioned | null,
  expectedVersion: number | undefined
): void {
  if (expectedVersion === undefined) {
    return;
  }
  const actual = current ? current.version : 0;
  if (actual !== expectedVersion) {
    throw new StoreConflictError(`Record '${key}' changed concurrently`, {
      key,
      expectedVersion,
      actualVersion: actual,
    });
  }
}

