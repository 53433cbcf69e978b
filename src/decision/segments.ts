import type { CreditSegment, DecisionConfig } from './types.js';

/**
 * Segment boundaries over the last four digits of the identity code.
 * - Debt      0000..2499
 * - Segment1  2500..4999
 * - Segment2  5000..7499
 * - Segment3  7500..9999
 */
export function segmentOf(key: number): CreditSegment {
  if (!Number.isInteger(key) || key < 0 || key > 9999) {
    throw new RangeError(`segment key out of range: ${key}`);
  }
  if (key < 2500) return 'Debt';
  if (key < 5000) return 'Segment1';
  if (key < 7500) return 'Segment2';
  return 'Segment3';
}

export function modifierFor(segment: CreditSegment, config: Pick<DecisionConfig, 'segmentModifiers'>): number {
  // zero means no loan at any period
  return segment === 'Debt' ? 0 : config.segmentModifiers[segment];
}

export function creditModifier(key: number, config: Pick<DecisionConfig, 'segmentModifiers'>): number {
  return modifierFor(segmentOf(key), config);
}
