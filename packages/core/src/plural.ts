/**
 * @module plural
 * Count → plural bucket selection. A fixed three-way split, not CLDR rules.
 */

import type { PluralCategory } from '@lexicon/types';

/** 0 → `none`, 1 → `one`, anything else (negatives, fractions, NaN) → `many`. */
export function pluralCategory(count: number): PluralCategory {
  if (count === 0) return 'none';
  if (count === 1) return 'one';
  return 'many';
}
