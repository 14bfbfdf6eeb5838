/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero,
 * NaN propagation, and out-of-range ratios.
 */

/**
 * Calculate safe division that guards against division by zero
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0 || !Number.isFinite(denominator)) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Calculate safe sum that guards against empty arrays
 */
export function safeSum(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Clamp a value into [min, max]; NaN collapses to min
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

/**
 * Clamp a ratio into [0, 1]
 */
export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Format a ratio as a percentage string with one decimal
 *
 * @example
 * ```typescript
 * formatPercent(0.6)    // => '60.0%'
 * ```
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
