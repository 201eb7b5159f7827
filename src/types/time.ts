/**
 * Time conversion constants for milliseconds
 * Based on mathematical definitions, not configurable
 */
export const TIME = {
  /** 1 second in milliseconds */
  SECOND: 1000,
} as const;

/** Converts epoch milliseconds to whole epoch seconds (JWT NumericDate). */
export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / TIME.SECOND);
}
