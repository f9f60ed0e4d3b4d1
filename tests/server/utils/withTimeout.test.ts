import { OperationTimeoutError } from '../../../src/server/types/errors.js';
import { withTimeout } from '../../../src/server/utils/withTimeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves with the operation result', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'Lookup')).resolves.toBe('done');
  });

  it('passes through the operation rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 1000, 'Lookup')).rejects.toThrow('refused');
  });

  it('rejects once the deadline passes', async () => {
    jest.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 500, 'Rerank request');

    jest.advanceTimersByTime(500);

    await expect(pending).rejects.toThrow(OperationTimeoutError);
    await expect(pending).rejects.toThrow('Rerank request timed out after 500ms');
  });
});
