import { MatchResult, TrackPoint } from "../models/geo-data";

export const DEFAULT_TOLERANCE_SECONDS = 3600;

/**
 * Pairs a photo capture time with the closest track point in time
 */
export class TemporalMatcher {
  /**
   * Find the point closest in time to `photoTime`.
   *
   * The first point reaching the minimum delta wins. When the minimum delta
   * exceeds the tolerance the result is a non-match that still carries the
   * delta (Infinity for an empty track).
   */
  static closest(
    photoTime: Date,
    points: readonly TrackPoint[],
    toleranceSeconds: number = DEFAULT_TOLERANCE_SECONDS
  ): MatchResult {
    const photoMs = photoTime.getTime();
    let closest: TrackPoint | null = null;
    let minDelta = Infinity;

    for (const point of points) {
      const delta = Math.abs(photoMs - point.time.getTime()) / 1000;
      if (delta < minDelta) {
        minDelta = delta;
        closest = point;
      }
    }

    if (closest && minDelta <= toleranceSeconds) {
      return { matched: true, point: closest, deltaSeconds: minDelta };
    }
    return { matched: false, deltaSeconds: minDelta };
  }
}
