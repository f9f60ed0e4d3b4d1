import { MongoServerError } from 'mongodb';
import { toStoreError } from '../../../src/server/services/content/MongoContentStore.js';
import { assertExpectedVersion, nextVersion, versionState } from '../../../src/server/services/content/versioning.js';
import { BadRequestError, DatabaseError, StoreConflictError } from '../../../src/server/types/errors.js';

describe('version state machine', () => {
  it('numbers versions from one', () => {
    expect(nextVersion(null)).toBe(1);
    expect(nextVersion({ version: 4, isLatest: true })).toBe(5);
  });

  it('names the two states', () => {
    expect(versionState({ version: 1, isLatest: true })).toBe('current');
    expect(versionState({ version: 1, isLatest: false })).toBe('superseded');
  });

  it('checks the expected version, treating a missing row as version 0', () => {
    expect(() => assertExpectedVersion('k', null, 0)).not.toThrow();
    expect(() => assertExpectedVersion('k', { version: 2, isLatest: true }, undefined)).not.toThrow();
    expect(() => assertExpectedVersion('k', { version: 2, isLatest: true }, 1)).toThrow(
      new StoreConflictError("Record 'k' changed concurrently")
    );
  });
});

describe('toStoreError', () => {
  const context = { key: 'k' };

  it('maps duplicate-key and write-conflict errors to StoreConflictError', () => {
    expect(toStoreError(new MongoServerError({ message: 'E11000 duplicate key', code: 11000 }), context)).toBeInstanceOf(
      StoreConflictError
    );
    expect(toStoreError(new MongoServerError({ message: 'WriteConflict', code: 112 }), context)).toBeInstanceOf(
      StoreConflictError
    );
    expect(
      toStoreError(
        new MongoServerError({ message: 'aborted', code: 251, errorLabels: ['TransientTransactionError'] }),
        context
      )
    ).toBeInstanceOf(StoreConflictError);
  });

  it('passes application errors through', () => {
    const error = new BadRequestError('bad');
    expect(toStoreError(error, context)).toBe(error);
  });

  it('wraps anything else in a DatabaseError', () => {
    const mapped = toStoreError(new Error('connection reset'), context);
    expect(mapped).toBeInstanceOf(DatabaseError);
    expect(mapped.message).toBe('Content store write failed: connection reset');
  });
});
