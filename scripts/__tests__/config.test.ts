import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "../config";

describe("DEFAULT_CONFIG", () => {
  it("waits 1.1 s between lookups and gives each one 10 s", () => {
    expect(DEFAULT_CONFIG.rateLimitMs).toBe(1100);
    expect(DEFAULT_CONFIG.timeoutMs).toBe(10_000);
  });

  it("points at the Nominatim search endpoint with the project's user agent", () => {
    expect(DEFAULT_CONFIG.endpoint).toBe("https://nominatim.openstreetmap.org/search");
    expect(DEFAULT_CONFIG.userAgent).toBe("CorrelAid Map Project");
  });

  it("reads and writes the expected files", () => {
    expect(DEFAULT_CONFIG.inputPath).toBe("correlaid_projects_addresses.json");
    expect(DEFAULT_CONFIG.outputPath).toBe("locations.geojson");
    expect(DEFAULT_CONFIG.baseUrl).toBe("https://correlaid.org");
  });
});
