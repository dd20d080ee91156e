// Run configuration for the geocoding pipeline

export type GeocodeConfig = {
  inputPath: string;
  outputPath: string;
  endpoint: string;
  userAgent: string;
  timeoutMs: number;
  rateLimitMs: number;
  /** Origin prepended to each project's `href`. */
  baseUrl: string;
};

export const DEFAULT_CONFIG: GeocodeConfig = {
  inputPath: "correlaid_projects_addresses.json",
  outputPath: "locations.geojson",
  endpoint: "https://nominatim.openstreetmap.org/search",
  // Nominatim usage policy expects a UA identifying the app
  userAgent: "CorrelAid Map Project",
  timeoutMs: 10_000,
  // Be a good citizen: 1 request / second
  rateLimitMs: 1100,
  baseUrl: "https://correlaid.org",
};
