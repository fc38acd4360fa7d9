import { describe, expect, it } from 'vitest';
import { createDigest, isHashAlgorithm } from './crypto.js';
import { isSameOrLater, nowInstant } from './time.js';
import { createOpId, createPlanId } from './id.js';
import { Lazy } from './lazy.js';

describe('createDigest', () => {
  it('hashes deterministically', () => {
    expect(createDigest('md5').digest('hex')).toBe('d41d8cd98f00b204e9800998ecf8427e');
    expect(createDigest('sha256').update('test').digest('hex')).toBe(
      '9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08'
    );
  });

  it('recognizes supported algorithms', () => {
    expect(isHashAlgorithm('md5')).toBe(true);
    expect(isHashAlgorithm('sha512')).toBe(false);
  });
});

describe('time helpers', () => {
  it('produces ISO instants', () => {
    expect(nowInstant()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('treats equal instants as same-or-later', () => {
    const a = new Date('2021-06-01T10:00:00.000Z');
    expect(isSameOrLater(new Date(a.getTime()), a)).toBe(true);
    expect(isSameOrLater(new Date(a.getTime() + 1), a)).toBe(true);
    expect(isSameOrLater(new Date(a.getTime() - 1), a)).toBe(false);
  });
});

describe('ids', () => {
  it('pads op ids and prefixes plan ids', () => {
    expect(createOpId(7)).toBe('op:000007');
    expect(createPlanId().startsWith('plan:')).toBe(true);
  });
});

describe('Lazy', () => {
  it('computes once for concurrent callers', async () => {
    let calls = 0;
    const lazy = new Lazy(async () => {
      calls += 1;
      return 'value';
    });
    expect(lazy.isSet).toBe(false);
    const [a, b] = await Promise.all([lazy.get(), lazy.get()]);
    expect(a).toBe('value');
    expect(b).toBe('value');
    expect(await lazy.get()).toBe('value');
    expect(calls).toBe(1);
    expect(lazy.isSet).toBe(true);
  });

  it('does not cache a failure', async () => {
    let calls = 0;
    const lazy = new Lazy(async () => {
      calls += 1;
      if (calls === 1) throw new Error('first attempt');
      return calls;
    });
    await expect(lazy.get()).rejects.toThrow('first attempt');
    expect(lazy.isSet).toBe(false);
    expect(await lazy.get()).toBe(2);
    expect(lazy.isSet).toBe(true);
  });
});
