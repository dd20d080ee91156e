// Shared types for script files

export type AddressRecord = {
  street?: string | null;
  number?: string | null;
  zip_code?: string | null;
  place?: string | null;
  country?: string | null;
};

export type OrganizationRecord = {
  name?: string | null;
  address?: AddressRecord | null;
};

export type ProjectRecord = {
  title?: string | null;
  href?: string | null;
  organization?: OrganizationRecord | null;
};

/** Address fields after trimming; absent values are "". */
export type TrimmedAddress = {
  street: string;
  number: string;
  zip_code: string;
  place: string;
  country: string;
};

export type GeoCoordinate = {
  lon: number;
  lat: number;
};

export type EnrichedLocation = {
  name: string;
  project: string;
  lon: number;
  lat: number;
  address: string;
  place: string;
  country: string;
  url: string | null;
};

export type LocationFeature = GeoJSON.Feature<GeoJSON.Point, EnrichedLocation>;

export type LocationFeatureCollection = GeoJSON.FeatureCollection<GeoJSON.Point, EnrichedLocation>;
