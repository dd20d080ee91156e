import type { ProjectRecord } from "./types";

// Shared validation utilities for the geocoding pipeline

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ProcessingResult<T> {
  success: boolean;
  data?: T;
  errors: string[];
}

/**
 * Validate geocoding coordinates are finite and inside WGS84 bounds
 */
export function validateCoordinates(lat: number | null, lon: number | null): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: []
  };

  if (lat === null || lon === null) {
    result.isValid = false;
    result.errors.push("Missing latitude or longitude");
    return result;
  }

  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    result.isValid = false;
    result.errors.push("Invalid latitude or longitude values");
    return result;
  }

  if (lat < -90 || lat > 90) {
    result.isValid = false;
    result.errors.push(`Latitude out of range: ${lat}`);
  }
  if (lon < -180 || lon > 180) {
    result.isValid = false;
    result.errors.push(`Longitude out of range: ${lon}`);
  }

  // Null Island is almost always a geocoder placeholder
  if (result.isValid && lat === 0 && lon === 0) {
    result.warnings.push("Coordinates at 0, 0 (may be incorrect)");
  }

  return result;
}

function isBlank(value: unknown): boolean {
  return typeof value !== "string" || value.trim() === "";
}

/**
 * Validate project record completeness. Nothing here is fatal; records
 * without place or country are skipped later by the pipeline itself.
 */
export function validateProjectRecord(record: ProjectRecord): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: []
  };

  if (isBlank(record.title)) {
    result.warnings.push("Missing recommended field: title");
  }
  if (isBlank(record.organization?.name)) {
    result.warnings.push("Missing recommended field: organization.name");
  }

  const address = record.organization?.address;
  for (const field of ["place", "country"] as const) {
    if (isBlank(address?.[field])) {
      result.warnings.push(`Missing address field: ${field}`);
    }
  }

  return result;
}

/**
 * Structured error handling wrapper for async functions
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string
): Promise<ProcessingResult<T>> {
  try {
    const data = await operation();
    return {
      success: true,
      data,
      errors: []
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${context} failed:`, errorMessage);

    return {
      success: false,
      errors: [`${context}: ${errorMessage}`]
    };
  }
}
