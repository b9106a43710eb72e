/**
 * Tests for runWithConcurrency
 *
 * @module run/__tests__/worker-pool
 */

import { describe, it, expect } from 'vitest';
import { runWithConcurrency } from '../worker-pool.js';

describe('runWithConcurrency', () => {
  it('should process every item with at most `concurrency` in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const processed: number[] = [];

    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (item) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, item % 3));
      processed.push(item);
      inFlight--;
    });

    expect(processed.sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(peak).toBe(3);
  });

  it('should pass each item its index', async () => {
    const seen: string[] = [];

    await runWithConcurrency(['a', 'b'], 4, async (item, index) => {
      seen.push(`${index}:${item}`);
    });

    expect(seen.sort()).toEqual(['0:a', '1:b']);
  });

  it('should resolve immediately for an empty list', async () => {
    await expect(runWithConcurrency([], 2, async () => undefined)).resolves.toBeUndefined();
  });

  it('should reject an invalid concurrency', async () => {
    await expect(runWithConcurrency([1], 0, async () => undefined)).rejects.toBeInstanceOf(RangeError);
  });
});
