import countryRegions from "../../data/countryRegions.json";

const COUNTRY_TO_REGION: Record<string, string> = countryRegions;

const BY_LOWER = new Map<string, string>(
  Object.entries(COUNTRY_TO_REGION).map(([country, region]) => [country.toLowerCase(), region])
);

export const REGIONS: string[] = [...new Set(Object.values(COUNTRY_TO_REGION))].sort();

export function regionOf(territory: string): string | null {
  const trimmed = territory.trim();
  if (!trimmed) return null;
  return COUNTRY_TO_REGION[trimmed] ?? BY_LOWER.get(trimmed.toLowerCase()) ?? null;
}

export function isKnownRegion(region: string): boolean {
  return REGIONS.includes(region);
}
