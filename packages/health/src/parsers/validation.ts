/**
 * Physiological limits for metric values
 */
export const VALIDATION = {
  QUALITY_MIN: 0,
  QUALITY_MAX: 100,
  HEART_RATE_MIN: 30,
  HEART_RATE_MAX: 220,
  RESTING_RATE_MIN: 30,
  RESTING_RATE_MAX: 100,
  PERCENT_MAX: 100,
} as const;

/**
 * Validate heart rate is within physiological range
 */
export function isValidHeartRate(value: number): boolean {
  return value >= VALIDATION.HEART_RATE_MIN && value <= VALIDATION.HEART_RATE_MAX;
}

/**
 * Validate resting heart rate is within physiological range
 */
export function isValidRestingRate(value: number): boolean {
  return value >= VALIDATION.RESTING_RATE_MIN && value <= VALIDATION.RESTING_RATE_MAX;
}

/**
 * Validate sleep quality score
 */
export function isValidQuality(value: number): boolean {
  return Number.isInteger(value) && value >= VALIDATION.QUALITY_MIN && value <= VALIDATION.QUALITY_MAX;
}

export function isValidPercentage(value: number): boolean {
  return value >= 0 && value <= VALIDATION.PERCENT_MAX;
}
