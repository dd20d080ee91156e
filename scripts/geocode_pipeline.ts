import { buildQuery, formatAddress, locationKey, trimAddress } from "./address";
import type { GeocodeConfig } from "./config";
import type { Geocoder } from "./nominatim";
import type { EnrichedLocation, GeoCoordinate, OrganizationRecord, ProjectRecord } from "./types";
import { validateProjectRecord } from "./validation";

export const UNKNOWN_ORGANIZATION = "Unknown Organization";

export type PipelineStats = {
  totalRecords: number;
  skipped: number;
  lookups: number;
  failedLookups: number;
  cacheHits: number;
  recordWarnings: number;
  locations: number;
};

export type PipelineResult = {
  locations: EnrichedLocation[];
  stats: PipelineStats;
};

export type PipelineDeps = {
  geocoder: Geocoder;
  config: Pick<GeocodeConfig, "rateLimitMs" | "baseUrl">;
  sleep?: (ms: number) => Promise<void>;
};

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function projectUrl(baseUrl: string, href: unknown): string | null {
  if (typeof href !== "string" || !href) return null;
  return `${baseUrl}${href}`;
}

/**
 * Geocode every project in input order. Records without place or country
 * are skipped; each place|country pair is looked up at most once unless the
 * lookup failed, in which case the next record with that key tries again.
 */
export async function geocodeProjects(projects: ProjectRecord[], deps: PipelineDeps): Promise<PipelineResult> {
  const wait = deps.sleep ?? sleep;
  const cache = new Map<string, GeoCoordinate>();
  const locations: EnrichedLocation[] = [];

  const stats: PipelineStats = {
    totalRecords: projects.length,
    skipped: 0,
    lookups: 0,
    failedLookups: 0,
    cacheHits: 0,
    recordWarnings: 0,
    locations: 0,
  };

  console.log(`📊 Processing ${projects.length} projects...`);

  for (const project of projects) {
    stats.recordWarnings += validateProjectRecord(project).warnings.length;

    const org: OrganizationRecord = project.organization ?? {};
    const addr = trimAddress(org.address);

    // Skip if no meaningful address
    const query = buildQuery(addr);
    if (!query) {
      stats.skipped++;
      continue;
    }

    const key = locationKey(addr);
    let coords = cache.get(key) ?? null;

    if (coords) {
      stats.cacheHits++;
    } else {
      console.log(`Geocoding: ${addr.place}, ${addr.country}`);
      stats.lookups++;
      coords = await deps.geocoder.geocode(query);
      await wait(deps.config.rateLimitMs);

      if (coords) {
        cache.set(key, coords);
      } else {
        stats.failedLookups++;
      }
    }

    if (!coords) continue;

    const name = typeof org.name === "string" && org.name.trim() ? org.name : UNKNOWN_ORGANIZATION;
    locations.push({
      name,
      project: typeof project.title === "string" ? project.title : "",
      lon: coords.lon,
      lat: coords.lat,
      address: formatAddress(addr),
      place: addr.place,
      country: addr.country,
      url: projectUrl(deps.config.baseUrl, project.href),
    });
  }

  stats.locations = locations.length;
  return { locations, stats };
}
