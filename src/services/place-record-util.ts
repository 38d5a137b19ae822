import { PlaceRecord, StoredPlaceRecord } from "../models/geo-data";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asString = (value: unknown): string =>
  typeof value === "string" ? value : "";

/**
 * Conversions between in-memory place records and the persisted format
 */
export class PlaceRecordUtil {
  /**
   * Validate a value read from the cache store. Only the coordinate is
   * required; missing text fields are read as empty.
   */
  static parseStored(value: unknown): StoredPlaceRecord | null {
    if (!isRecord(value)) return null;

    const lat = Number(value.lat);
    const lon = Number(value.lon);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;

    const stored: StoredPlaceRecord = {
      city: typeof value.city === "string" ? value.city : null,
      state: asString(value.state),
      country: asString(value.country),
      country_code: asString(value.country_code),
      found: value.found === true,
      lat,
      lon,
    };
    if (typeof value.anonymized === "boolean") {
      stored.anonymized = value.anonymized;
    }

    for (const [field, fieldValue] of Object.entries(value)) {
      if (!(field in stored) && field !== "anonymized") {
        stored[field] = fieldValue;
      }
    }
    return stored;
  }

  static fromStored(stored: StoredPlaceRecord): PlaceRecord {
    const record: PlaceRecord = {
      city: stored.city,
      state: stored.state,
      country: stored.country,
      countryCode: stored.country_code,
      found: stored.found,
      lat: stored.lat,
      lon: stored.lon,
    };
    if (stored.anonymized !== undefined) {
      record.anonymized = stored.anonymized;
    }
    return record;
  }

  /**
   * Convert to the persisted format. Unknown fields of `previous` (the
   * entry being replaced) are carried over.
   */
  static toStored(
    record: PlaceRecord,
    previous?: StoredPlaceRecord
  ): StoredPlaceRecord {
    const stored: StoredPlaceRecord = {
      ...(previous ?? {}),
      city: record.city,
      state: record.state,
      country: record.country,
      country_code: record.countryCode,
      found: record.found,
      lat: record.lat,
      lon: record.lon,
    };
    if (record.anonymized !== undefined) {
      stored.anonymized = record.anonymized;
    }
    return stored;
  }

  /**
   * Text used for a track point description
   * Example: "Lyon, Auvergne-Rhône-Alpes, France (FR)"
   */
  static describe(place: {
    city?: string | null;
    state?: string;
    country?: string;
    countryCode?: string;
  }): string {
    const city = place.city ?? "";
    const country = place.country ?? "";
    const code = place.countryCode ?? "";
    if (place.state) {
      return `${city}, ${place.state}, ${country} (${code})`;
    }
    return `${city}, ${country} (${code})`;
  }
}
