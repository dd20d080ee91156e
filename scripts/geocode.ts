import { DEFAULT_CONFIG } from "./config";
import { geocodeProjects } from "./geocode_pipeline";
import { toFeatureCollection, writeGeoJson } from "./geojson";
import { loadProjects } from "./load_projects";
import { createNominatimGeocoder } from "./nominatim";
import { withErrorHandling } from "./validation";

async function main() {
  const config = DEFAULT_CONFIG;

  const result = await withErrorHandling(async () => {
    const projects = await loadProjects(config.inputPath);

    const { locations, stats } = await geocodeProjects(projects, {
      geocoder: createNominatimGeocoder(config),
      config,
    });

    await writeGeoJson(config.outputPath, toFeatureCollection(locations));

    return stats;
  }, "Geocoding process");

  if (!result.success || !result.data) {
    console.error("❌ Geocoding failed with errors:", result.errors);
    process.exit(1);
  }

  const stats = result.data;
  console.log(`\n✓ Successfully geocoded ${stats.locations} unique locations`);
  console.log(`✓ Saved to ${config.outputPath}`);
  console.log(
    `📊 Lookups: ${stats.lookups} (${stats.failedLookups} failed), ${stats.cacheHits} cache hits, ${stats.skipped} skipped`
  );
  if (stats.recordWarnings > 0) {
    console.log(`   ⚠️  ${stats.recordWarnings} record warnings`);
  }
}

main().catch((err) => {
  console.error("❌ geocode failed:", err);
  process.exit(1);
});
