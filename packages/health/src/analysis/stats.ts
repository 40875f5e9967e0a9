/**
 * Basic descriptive statistics
 */

export interface BasicStats {
  count: number;
  sum: number;
  /** null when there are no values */
  min: number | null;
  max: number | null;
  mean: number | null;
}

/**
 * Count, sum, min, max and arithmetic mean of a list of values
 */
export function describeValues(values: number[]): BasicStats {
  if (values.length === 0) {
    return { count: 0, sum: 0, min: null, max: null, mean: null };
  }

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return { count: values.length, sum, min, max, mean: sum / values.length };
}

export function meanOf(values: number[]): number | null {
  return describeValues(values).mean;
}

/**
 * Sum, or null when there is nothing to add up
 */
export function sumOf(values: number[]): number | null {
  return values.length === 0 ? null : describeValues(values).sum;
}
