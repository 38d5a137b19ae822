const EARTH_RADIUS_KM = 6371;

export interface DmsCoordinate {
  degrees: number;
  minutes: number;
  seconds: number;
  ref: "N" | "S" | "E" | "W";
}

/**
 * Utility functions for working with coordinates
 */
export class GeoUtil {
  /**
   * Great-circle distance between two points, in kilometres
   * Example: (48.8566, 2.3522) -> (51.5074, -0.1278) ≈ 343.5
   */
  static haversineKm(
    lat1: number,
    lon1: number,
    lat2: number,
    lon2: number
  ): number {
    const toRad = (deg: number) => (deg * Math.PI) / 180;

    const dLat = toRad(lat2 - lat1);
    const dLon = toRad(lon2 - lon1);

    const a =
      Math.sin(dLat / 2) ** 2 +
      Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

    return EARTH_RADIUS_KM * c;
  }

  /**
   * Quantized cache key for a coordinate
   * Example: (48.8566, 2.3522) -> "48.856600,2.352200"
   */
  static cacheKey(lat: number, lon: number): string {
    return `${lat.toFixed(6)},${lon.toFixed(6)}`;
  }

  /**
   * Parse a cache key back into a coordinate, or null if it is not one
   */
  static parseCacheKey(key: string): { lat: number; lon: number } | null {
    const parts = key.split(",");
    if (parts.length !== 2) return null;

    const lat = Number(parts[0]);
    const lon = Number(parts[1]);
    if (parts[0].trim() === "" || parts[1].trim() === "") return null;
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;

    return { lat, lon };
  }

  static isValidCoordinate(lat: number, lon: number): boolean {
    return (
      Number.isFinite(lat) &&
      Number.isFinite(lon) &&
      lat >= -90 &&
      lat <= 90 &&
      lon >= -180 &&
      lon <= 180
    );
  }

  /**
   * Convert decimal degrees to degrees/minutes/seconds with a hemisphere
   * reference, as stored in photo GPS tags
   */
  static toDms(decimal: number, axis: "lat" | "lon"): DmsCoordinate {
    const positive = decimal >= 0;
    const abs = Math.abs(decimal);

    const degrees = Math.floor(abs);
    const minutesDecimal = (abs - degrees) * 60;
    const minutes = Math.floor(minutesDecimal);
    // Hundredths of a second, truncated
    const seconds = Math.floor((minutesDecimal - minutes) * 60 * 100) / 100;

    let ref: DmsCoordinate["ref"];
    if (axis === "lat") {
      ref = positive ? "N" : "S";
    } else {
      ref = positive ? "E" : "W";
    }

    return { degrees, minutes, seconds, ref };
  }

  /**
   * Example: 48.8566 (lat) -> 48°51'23.76"N
   */
  static formatDms(decimal: number, axis: "lat" | "lon"): string {
    const dms = GeoUtil.toDms(decimal, axis);
    return `${dms.degrees}°${dms.minutes}'${dms.seconds.toFixed(2)}"${dms.ref}`;
  }
}
