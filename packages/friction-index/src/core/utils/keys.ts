/**
 * Key helpers for joins, grouping and deterministic ordering
 */

import type { DistrictKey, GeoPeriodKey } from '../types/index.js';

const SEPARATOR = '|';

export function geoPeriodId(key: GeoPeriodKey): string {
  return [key.state, key.district, key.period].join(SEPARATOR);
}

export function districtId(key: DistrictKey): string {
  return [key.state, key.district].join(SEPARATOR);
}

/**
 * Plain code-unit comparison, independent of the host locale
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order by state, then district, then period, all ascending
 */
export function compareGeoPeriodKeys(a: GeoPeriodKey, b: GeoPeriodKey): number {
  return (
    compareText(a.state, b.state) ||
    compareText(a.district, b.district) ||
    compareText(a.period, b.period)
  );
}

/**
 * Group items by a string id, keeping first-seen order of the groups
 */
export function groupBy<T>(items: readonly T[], id: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = id(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}
