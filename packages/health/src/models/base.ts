/**
 * Base types shared by all health metric records
 */

/**
 * All metric records share these common fields
 */
export interface BaseRecord {
  /** Unix timestamp in milliseconds */
  timestamp: number;
  /** Device or account the record came from (e.g., "garmin", "manual") */
  source: string;
  /** When this record was stored */
  importedAt?: number;
}
