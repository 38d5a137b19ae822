import axios, { AxiosInstance } from "axios";
import { GeoError, ZoomTier } from "../models/errors";

/**
 * Zoom level sent for each precision tier
 */
export const ZOOM_LEVELS: Record<ZoomTier, number> = {
  street: 18,
  region: 12,
  country: 5,
};

/**
 * Address fields tried, in order, as the city name
 */
export const CITY_FIELDS = [
  "city",
  "town",
  "village",
  "municipality",
  "county",
  "state_district",
  "suburb",
  "neighbourhood",
  "hamlet",
  "locality",
] as const;

export interface ReverseGeocodeResult {
  city: string | null;
  state: string;
  country: string;
  countryCode: string;
}

export interface ForwardGeocodeResult {
  lat: number;
  lon: number;
}

/**
 * Geocoding backend used by the resolver. Implementations reject with a
 * GeoError on timeouts, HTTP errors and malformed responses.
 */
export interface GeocodingProvider {
  reverse(lat: number, lon: number, tier: ZoomTier): Promise<ReverseGeocodeResult>;
  /**
   * Resolves null when the query matches nothing
   */
  search(query: string): Promise<ForwardGeocodeResult | null>;
}

export interface NominatimOptions {
  baseUrl: string;
  userAgent: string;
  language: string;
  timeoutMs: number;
}

type HttpGet = Pick<AxiosInstance, "get">;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const text = (value: unknown): string =>
  typeof value === "string" ? value.trim() : "";

/**
 * Nominatim (OpenStreetMap) client
 */
export class NominatimProvider implements GeocodingProvider {
  private readonly http: HttpGet;

  constructor(options: NominatimOptions, http?: HttpGet) {
    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: {
          "User-Agent": options.userAgent,
          "Accept-Language": options.language,
        },
        params: { "accept-language": options.language },
      });
  }

  public async reverse(
    lat: number,
    lon: number,
    tier: ZoomTier
  ): Promise<ReverseGeocodeResult> {
    const data = await this.request("/reverse", {
      lat,
      lon,
      format: "json",
      zoom: ZOOM_LEVELS[tier],
    });

    if (!isRecord(data)) {
      throw new GeoError("payload", "Reverse geocoding response is not an object");
    }
    if (!isRecord(data.address)) {
      throw new GeoError(
        "payload",
        text(data.error) || "Reverse geocoding response has no address"
      );
    }

    return NominatimProvider.parseAddress(data.address);
  }

  public async search(query: string): Promise<ForwardGeocodeResult | null> {
    const data = await this.request("/search", {
      q: query,
      format: "json",
      limit: 1,
    });

    if (!Array.isArray(data)) {
      throw new GeoError("payload", "Search response is not a list");
    }
    if (data.length === 0) {
      return null;
    }

    const first: unknown = data[0];
    if (!isRecord(first)) {
      throw new GeoError("payload", "Search result is not an object");
    }

    const lat = Number(first.lat);
    const lon = Number(first.lon);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      throw new GeoError("payload", "Search result has no coordinates");
    }
    return { lat, lon };
  }

  /**
   * Pick the city, state and country out of a Nominatim address object
   */
  static parseAddress(address: Record<string, unknown>): ReverseGeocodeResult {
    let city: string | null = null;
    for (const field of CITY_FIELDS) {
      const candidate = text(address[field]);
      if (candidate) {
        city = candidate;
        break;
      }
    }

    return {
      city,
      state: text(address.state),
      country: text(address.country),
      countryCode: text(address.country_code).toUpperCase(),
    };
  }

  private async request(
    url: string,
    params: Record<string, string | number>
  ): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, { params });
      return response.data;
    } catch (error) {
      throw NominatimProvider.toGeoError(error);
    }
  }

  private static toGeoError(error: unknown): GeoError {
    if (error instanceof GeoError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        return new GeoError(
          "http",
          `HTTP error ${error.response.status}`,
          error.response.status
        );
      }
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return new GeoError("timeout", "Connection timeout");
      }
      return new GeoError("network", error.message);
    }

    return new GeoError(
      "network",
      error instanceof Error ? error.message : String(error)
    );
  }
}
