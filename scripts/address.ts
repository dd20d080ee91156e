import type { AddressRecord, TrimmedAddress } from "./types";

function clean(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function trimAddress(addr: AddressRecord | null | undefined): TrimmedAddress {
  return {
    street: clean(addr?.street),
    number: clean(addr?.number),
    zip_code: clean(addr?.zip_code),
    place: clean(addr?.place),
    country: clean(addr?.country),
  };
}

/** Case-insensitive dedup key shared by every record in the same place and country. */
export function locationKey(addr: TrimmedAddress): string {
  return `${addr.place}|${addr.country}`.toLowerCase();
}

/**
 * Free-text Nominatim query: "street number, zip, place, country".
 * Place and country always come last; a street without a house number (or
 * the reverse) is left out entirely.
 */
export function buildQuery(address: AddressRecord | TrimmedAddress): string | null {
  const a = trimAddress(address);
  if (!a.place || !a.country) return null;

  const parts: string[] = [];
  if (a.street && a.number) parts.push(`${a.street} ${a.number}`);
  if (a.zip_code) parts.push(a.zip_code);
  parts.push(a.place, a.country);

  const query = parts.join(", ").trim();
  return query ? query : null;
}

/** Display address "street number, zip place, country" without empty pieces. */
export function formatAddress(a: TrimmedAddress): string {
  const streetLine = [a.street, a.number].filter(Boolean).join(" ");
  const placeLine = [a.zip_code, a.place].filter(Boolean).join(" ");
  return [streetLine, placeLine, a.country].filter(Boolean).join(", ");
}
