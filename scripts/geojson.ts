import { promises as fs } from "node:fs";
import path from "node:path";
import { featureCollection, point } from "@turf/helpers";
import { IOError } from "./errors";
import type { EnrichedLocation, LocationFeature, LocationFeatureCollection } from "./types";

export function toFeatureCollection(locations: EnrichedLocation[]): LocationFeatureCollection {
  const features: LocationFeature[] = locations.map((loc) => point([loc.lon, loc.lat], { ...loc }));
  return featureCollection(features);
}

/** Write the collection in one go; non-ASCII text stays literal. */
export async function writeGeoJson(p: string, geojson: LocationFeatureCollection): Promise<void> {
  const body = JSON.stringify(geojson, null, 2);
  try {
    await fs.mkdir(path.dirname(p), { recursive: true });
    await fs.writeFile(p, body, "utf8");
  } catch (e) {
    throw new IOError(`Cannot write ${p}: ${e instanceof Error ? e.message : String(e)}`, p, e);
  }
}
