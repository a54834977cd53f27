import { FilterInputError } from "../lib/errors";
import { CASE_TYPES, isCaseType } from "../ingest/types";
import type { CaseType, JoinedRow } from "../ingest/types";
import type { ReferenceTable } from "../reference/parseReferenceTable";
import { isKnownRegion, regionOf, REGIONS } from "./regions";

export type FilterCriteria = {
  caseType: string;
  industry?: string | null;
  country?: string | null;
  region?: string | null;
};

export type FilterOptions = {
  industries: string[];
  countries: string[];
  regions: string[];
};

const NO_FILTER = "none";

function activeValue(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === NO_FILTER) return null;
  return trimmed;
}

export function resolveCaseType(raw: string | null | undefined): CaseType {
  const value = (raw ?? "").trim().toUpperCase();
  if (!value) {
    throw new FilterInputError("case_type", "", "case_type is required");
  }
  if (!isCaseType(value)) {
    throw new FilterInputError(
      "case_type",
      raw ?? "",
      `Invalid case_type "${raw ?? ""}". Expected one of: ${CASE_TYPES.join(", ")}`
    );
  }
  return value;
}

export function filterRows(rows: readonly JoinedRow[], criteria: FilterCriteria): JoinedRow[] {
  const caseType = resolveCaseType(criteria.caseType);
  const industry = activeValue(criteria.industry);
  const country = activeValue(criteria.country);
  const region = activeValue(criteria.region);

  if (region && !isKnownRegion(region)) {
    throw new FilterInputError(
      "region",
      region,
      `Unknown region "${region}". Expected one of: ${REGIONS.join(", ")}`
    );
  }

  return rows.filter((row) => {
    if (row.case_type !== caseType) return false;
    if (industry && row.industry !== industry) return false;
    if (country && row.territory !== country) return false;
    if (region && regionOf(row.territory) !== region) return false;
    return true;
  });
}

function distinctSorted(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen].sort((a, b) => a.localeCompare(b));
}

export function listFilterOptions(table: ReferenceTable): FilterOptions {
  const records = [...table.records.values()];
  return {
    industries: distinctSorted(records.map((record) => record.industry)),
    countries: distinctSorted(records.map((record) => record.territory)),
    regions: [...REGIONS],
  };
}
