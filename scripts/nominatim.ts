import type { GeocodeConfig } from "./config";
import type { GeoCoordinate } from "./types";
import { validateCoordinates } from "./validation";

/** Anything that turns a free-text query into a coordinate, or null when it can't. */
export interface Geocoder {
  geocode(query: string): Promise<GeoCoordinate | null>;
}

export type NominatimOptions = Pick<GeocodeConfig, "endpoint" | "userAgent" | "timeoutMs">;

type NominatimHit = {
  lat?: unknown;
  lon?: unknown;
};

function toNumber(v: unknown): number | null {
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim() !== "") return Number(v);
  return null;
}

function isHit(v: unknown): v is NominatimHit {
  return typeof v === "object" && v !== null;
}

/**
 * Single best-match lookup against the Nominatim search API. Every failure
 * (network, timeout, HTTP status, bad JSON, no hits, bad coordinates) is
 * logged and comes back as null; nothing is retried.
 */
export async function geocodeNominatim(
  query: string,
  opts: NominatimOptions,
  fetchImpl: typeof fetch = fetch
): Promise<GeoCoordinate | null> {
  const url = new URL(opts.endpoint);
  url.searchParams.set("q", query);
  url.searchParams.set("format", "json");
  url.searchParams.set("limit", "1");

  let res: Response;
  try {
    res = await fetchImpl(url.toString(), {
      headers: { "User-Agent": opts.userAgent },
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (e) {
    console.warn(`⚠️  Error geocoding '${query}': ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }

  if (!res.ok) {
    console.warn(`⚠️  Error geocoding '${query}': HTTP ${res.status} ${res.statusText}`);
    return null;
  }

  let data: unknown;
  try {
    data = await res.json();
  } catch (e) {
    console.warn(`⚠️  Error geocoding '${query}': invalid_json (${String(e)})`);
    return null;
  }

  if (!Array.isArray(data)) {
    console.warn(`⚠️  Error geocoding '${query}': unexpected response shape`);
    return null;
  }
  if (data.length === 0) {
    console.warn(`⚠️  No results for '${query}'`);
    return null;
  }

  const hit: unknown = data[0];
  const lat = isHit(hit) ? toNumber(hit.lat) : null;
  const lon = isHit(hit) ? toNumber(hit.lon) : null;

  const validation = validateCoordinates(lat, lon);
  if (!validation.isValid || lat === null || lon === null) {
    console.warn(`⚠️  Error geocoding '${query}':`, validation.errors);
    return null;
  }
  for (const w of validation.warnings) {
    console.warn(`⚠️  '${query}': ${w}`);
  }

  // GeoJSON axis order: longitude first
  return { lon, lat };
}

export function createNominatimGeocoder(opts: NominatimOptions, fetchImpl: typeof fetch = fetch): Geocoder {
  return {
    geocode: (query) => geocodeNominatim(query, opts, fetchImpl),
  };
}
