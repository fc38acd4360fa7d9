import type { LimitFunction } from 'p-limit';

export interface Keyed<T, K> {
  item: T;
  key: K;
}

export interface KeyedGroup<T, K> {
  key: K;
  members: T[];
}

/** Stable grouping: groups appear in order of their first member, members in input order. */
export function partitionBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function withoutSingletons<T>(groups: Iterable<T[]>): T[][] {
  const kept: T[][] = [];
  for (const group of groups) {
    if (group.length > 1) kept.push(group);
  }
  return kept;
}

/**
 * Resolves one async key per item through `limit`. The result keeps input
 * order whatever order the keys settle in. The first rejection rejects the
 * whole call and drops every task still waiting in `limit`.
 */
export async function keyAll<T, K>(
  items: readonly T[],
  keyOf: (item: T) => Promise<K>,
  limit: LimitFunction
): Promise<Keyed<T, K>[]> {
  try {
    return await Promise.all(items.map((item) => limit(async () => ({ item, key: await keyOf(item) }))));
  } catch (err) {
    limit.clearQueue();
    throw err;
  }
}

/** Splits each group by an async key and drops the sub-groups left with one member. */
export async function refine<T, K>(
  groups: readonly T[][],
  keyOf: (item: T) => Promise<K>,
  limit: LimitFunction
): Promise<KeyedGroup<T, K>[]> {
  const keyedGroups = await Promise.all(groups.map((group) => keyAll(group, keyOf, limit)));
  const refined: KeyedGroup<T, K>[] = [];
  for (const keyed of keyedGroups) {
    for (const [key, members] of partitionBy(keyed, (entry) => entry.key)) {
      if (members.length > 1) refined.push({ key, members: members.map((entry) => entry.item) });
    }
  }
  return refined;
}
