/**
 * Internal Helpers
 *
 * Pure utility functions shared across the reporting modules.
 */

// ============================================================================
// Ordering
// ============================================================================

/** Code-unit order; independent of the host locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

// ============================================================================
// Grouping
// ============================================================================

export function groupBy<T, K extends string>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>()
  for (const item of items) {
    const key = keyOf(item)
    const group = groups.get(key)
    if (group) group.push(item)
    else groups.set(key, [item])
  }
  return groups
}

export function countBy<T, K extends string>(items: readonly T[], keyOf: (item: T) => K): Map<K, number> {
  const counts = new Map<K, number>()
  for (const item of items) {
    const key = keyOf(item)
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }
  return counts
}

export function countDistinct<T>(items: readonly T[], valueOf: (item: T) => string): number {
  return new Set(items.map(valueOf)).size
}
