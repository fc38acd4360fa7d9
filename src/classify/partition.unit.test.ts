import { describe, expect, it } from 'vitest';
import pLimit from 'p-limit';
import { keyAll, partitionBy, refine, withoutSingletons } from './partition.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('partitionBy', () => {
  it('groups stably by first appearance', () => {
    const groups = partitionBy(['bb', 'a', 'cc', 'd', 'eee'], (s) => s.length);
    expect(Array.from(groups.entries())).toEqual([
      [2, ['bb', 'cc']],
      [1, ['a', 'd']],
      [3, ['eee']]
    ]);
  });
});

describe('withoutSingletons', () => {
  it('keeps only groups with at least two members', () => {
    expect(withoutSingletons([[1], [2, 3], [], [4, 5, 6]])).toEqual([[2, 3], [4, 5, 6]]);
  });
});

describe('keyAll', () => {
  it('keeps input order when keys settle out of order', async () => {
    const keyed = await keyAll(
      [30, 10, 20],
      async (ms) => {
        await delay(ms);
        return `k${ms}`;
      },
      pLimit(3)
    );
    expect(keyed).toEqual([
      { item: 30, key: 'k30' },
      { item: 10, key: 'k10' },
      { item: 20, key: 'k20' }
    ]);
  });

  it('never runs more keys at once than the limit allows', async () => {
    let running = 0;
    let peak = 0;
    await keyAll(
      [1, 2, 3, 4, 5, 6],
      async (n) => {
        running += 1;
        peak = Math.max(peak, running);
        await delay(5);
        running -= 1;
        return n;
      },
      pLimit(2)
    );
    expect(peak).toBe(2);
  });

  it('rejects when any key fails', async () => {
    const failing = keyAll(
      [1, 2],
      async (n) => {
        if (n === 2) throw new Error('unreadable');
        return n;
      },
      pLimit(1)
    );
    await expect(failing).rejects.toThrow('unreadable');
  });

  it('stops starting queued keys once one has failed', async () => {
    const started: number[] = [];
    const failing = keyAll(
      [1, 2, 3, 4, 5],
      async (n) => {
        started.push(n);
        if (n === 1) throw new Error('unreadable');
        await delay(5);
        return n;
      },
      pLimit(1)
    );
    await expect(failing).rejects.toThrow('unreadable');
    await delay(40);
    expect(started.length).toBeLessThanOrEqual(2);
    expect(started[0]).toBe(1);
  });
});

describe('refine', () => {
  it('splits each group and drops singletons', async () => {
    const refined = await refine(
      [
        ['apple', 'avocado', 'banana'],
        ['cherry', 'cranberry']
      ],
      async (word) => word[0],
      pLimit(4)
    );
    expect(refined).toEqual([
      { key: 'a', members: ['apple', 'avocado'] },
      { key: 'c', members: ['cherry', 'cranberry'] }
    ]);
  });
});
