/** Upper bound of the tracker's rating scale */
export const SOURCE_RATING_MAX = 10

/** Default upper bound of the destination scale (whole stars) */
export const DEFAULT_RATING_SCALE_MAX = 5

/**
 * Rescale a 0-10 rating onto 0-`scaleMax`, rounding half up.
 *
 * Integer arithmetic keeps ties exact: 7 on a 0-5 scale is 3.5 and becomes 4.
 * The result is clamped to the destination range.
 */
export function convertRating(
  source: number,
  scaleMax: number = DEFAULT_RATING_SCALE_MAX,
): number {
  const scaled = Math.floor(
    (source * scaleMax + SOURCE_RATING_MAX / 2) / SOURCE_RATING_MAX,
  )
  return Math.min(Math.max(scaled, 0), scaleMax)
}

export function convertOptionalRating(
  source: number | null,
  scaleMax: number = DEFAULT_RATING_SCALE_MAX,
): number | null {
  return source === null ? null : convertRating(source, scaleMax)
}
