import { describe, expect, it, vi } from 'vitest';

import {
  ContractViolationError,
  RateLimitedError,
  TemporaryFailureError,
  type AddResult,
} from '@tracksync/contracts';

import { silentLogger } from '../../logger';
import { BatchProcessor, splitIntoBatches, type BatchWriter } from '../batchProcessor';

const ok = (count: number): AddResult => ({ added: count, duplicates: 0, errors: 0 });

const setup = (addTracksBatch: BatchWriter['addTracksBatch'], options: { batchSize?: number; maxRetries?: number } = {}) => {
  const sleep = vi.fn(async (_ms: number) => {});
  const writer = { addTracksBatch: vi.fn(addTracksBatch) };
  const processor = new BatchProcessor(writer, { ...options, sleep, logger: silentLogger() });
  return { processor, writer, sleep };
};

describe('splitIntoBatches', () => {
  it('chunks in order with a shorter last batch', () => {
    expect(splitIntoBatches(['1', '2', '3', '4', '5', '6', '7'], 3)).toEqual([
      ['1', '2', '3'],
      ['4', '5', '6'],
      ['7'],
    ]);
  });

  it('returns no batches for no input', () => {
    expect(splitIntoBatches([], 3)).toEqual([]);
  });

  it('rejects a batch size below one', () => {
    expect(() => splitIntoBatches(['1'], 0)).toThrow(ContractViolationError);
  });
});

describe('BatchProcessor', () => {
  it('uses the configured batch size', () => {
    const { processor } = setup(async (_id, uris) => ok(uris.length), { batchSize: 3 });

    expect(processor.splitIntoBatches(['1', '2', '3', '4', '5', '6', '7'])).toEqual([
      ['1', '2', '3'],
      ['4', '5', '6'],
      ['7'],
    ]);
  });

  it('rejects batch sizes above the provider limit', () => {
    expect(() => setup(async () => ok(0), { batchSize: 101 })).toThrow(ContractViolationError);
  });

  it('returns the write result on success', async () => {
    const { processor, writer, sleep } = setup(async (_id, uris) => ok(uris.length));

    await expect(processor.processBatch('pl-1', ['a', 'b'], 'job-1', 0)).resolves.toEqual(ok(2));
    expect(writer.addTracksBatch).toHaveBeenCalledWith('pl-1', ['a', 'b']);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('simulates success in a dry run without writing', async () => {
    const { processor, writer } = setup(async () => ok(0));

    await expect(processor.processBatch('pl-1', ['a', 'b', 'c'], 'job-1', 0, true)).resolves.toEqual(ok(3));
    expect(writer.addTracksBatch).not.toHaveBeenCalled();
  });

  it('waits out a rate limit once without spending a retry', async () => {
    let calls = 0;
    const { processor, writer, sleep } = setup(
      async (_id, uris) => {
        calls += 1;
        if (calls === 1) throw new RateLimitedError(1500);
        return ok(uris.length);
      },
      { maxRetries: 0 },
    );

    const result = await processor.processBatch('pl-1', ['a', 'b', 'c'], 'job-1', 0);

    expect(result.added).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1500);
    expect(writer.addTracksBatch).toHaveBeenCalledTimes(2);
  });

  it('backs off exponentially on transient failures', async () => {
    let calls = 0;
    const { processor, sleep } = setup(async (_id, uris) => {
      calls += 1;
      if (calls <= 3) throw new TemporaryFailureError('HTTP 503');
      return ok(uris.length);
    });

    await expect(processor.processBatch('pl-1', ['a'], 'job-1', 0)).resolves.toEqual(ok(1));
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
  });

  it('gives up after the retry budget', async () => {
    const { processor, writer, sleep } = setup(
      async () => {
        throw new Error('socket hang up');
      },
      { maxRetries: 2 },
    );

    const attempt = processor.processBatch('pl-1', ['a'], 'job-1', 4);

    await expect(attempt).rejects.toBeInstanceOf(TemporaryFailureError);
    await expect(attempt).rejects.toThrow('Failed to process batch after 2 retries: socket hang up');
    expect(writer.addTracksBatch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });
});
