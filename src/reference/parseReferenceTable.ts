import type { DuplicatePolicy } from "../config/env";
import { ReferenceUnavailableError } from "../lib/errors";
import { cellText, isBlankRow, mapHeaders, readFirstSheetMatrix, readWorkbook } from "../ingest/sheetUtils";

export type ReferenceRecord = {
  business_id: string;
  account_name: string;
  industry: string;
  territory: string;
};

export type ReferenceTable = {
  records: Map<string, ReferenceRecord>;
  duplicateIds: string[];
  rowCount: number;
};

const HEADER_ALIASES: Record<string, string[]> = {
  business_id: ["business id"],
  account_name: ["account account name", "account name"],
  industry: ["account industry", "industry"],
  territory: ["account owner territory", "owner territory", "territory"],
};

const COLUMN_LABELS: Record<string, string> = {
  business_id: "Business Id",
  account_name: "Account: Account Name",
  industry: "Account: Industry",
  territory: "Account: Owner Territory",
};

export function parseReferenceCsv(
  csv: string,
  policy: DuplicatePolicy = "last_write_wins"
): ReferenceTable {
  const matrix = readFirstSheetMatrix(readWorkbook(csv, "string"));
  if (!matrix.length) {
    throw new ReferenceUnavailableError("parse", "Reference sheet export is empty.");
  }

  const headers = (matrix[0] ?? []).map((value) => cellText(value));
  const headerMap = mapHeaders(headers, HEADER_ALIASES);
  const missing = Object.keys(HEADER_ALIASES).filter((field) => headerMap[field] === undefined);
  if (missing.length) {
    throw new ReferenceUnavailableError(
      "parse",
      `Reference sheet is missing columns: ${missing.map((field) => COLUMN_LABELS[field]).join(", ")}`
    );
  }

  const records = new Map<string, ReferenceRecord>();
  const duplicateIds = new Set<string>();
  let rowCount = 0;

  for (let i = 1; i < matrix.length; i += 1) {
    const row = matrix[i] ?? [];
    if (isBlankRow(row)) continue;
    const businessId = cellText(row[headerMap.business_id]);
    if (!businessId) continue;
    rowCount += 1;

    if (records.has(businessId)) {
      duplicateIds.add(businessId);
      if (policy === "first_write_wins") continue;
    }

    records.set(businessId, {
      business_id: businessId,
      account_name: cellText(row[headerMap.account_name]),
      industry: cellText(row[headerMap.industry]),
      territory: cellText(row[headerMap.territory]),
    });
  }

  return { records, duplicateIds: [...duplicateIds], rowCount };
}
