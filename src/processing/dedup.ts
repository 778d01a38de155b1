import type { RawLineItem } from '../core/types.js';

/**
 * Collapse repeated (accountName, statementName) line items from a single
 * fetch, keeping the lowest `order` (highest display priority).
 *
 * Equal orders: the later item wins. Output order is insertion order of the
 * first occurrence of each key; callers sort before persisting.
 */
export function dedupeLineItems(items: readonly RawLineItem[]): RawLineItem[] {
  const survivors = new Map<string, RawLineItem>();

  for (const item of items) {
    const key = dedupKey(item);
    const existing = survivors.get(key);
    if (!existing || item.order <= existing.order) {
      survivors.set(key, item);
    }
  }

  return Array.from(survivors.values());
}

function dedupKey(item: RawLineItem): string {
  return `${item.accountName}\u0000${item.statementName}`;
}

/** Sort by statement (BS, IS, CF) then by display order */
export function sortForPersistence<T extends Pick<RawLineItem, 'statementType' | 'order'>>(items: readonly T[]): T[] {
  const rank: Record<RawLineItem['statementType'], number> = { BS: 0, IS: 1, CF: 2 };
  return [...items].sort((a, b) => rank[a.statementType] - rank[b.statementType] || a.order - b.order);
}
