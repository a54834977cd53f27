import type { JoinedRow, PerformanceRow, ReferenceFields } from "../ingest/types";
import type { ReferenceTable } from "./parseReferenceTable";

export type JoinableRow = PerformanceRow & Partial<ReferenceFields>;

function keepOrFill(current: string | undefined, fromReference: string | undefined): string {
  if (current && current.trim()) return current;
  return fromReference ?? "";
}

// Left join on business_id; fields a row already carries are never overwritten.
export function joinReference(rows: readonly JoinableRow[], table: ReferenceTable): JoinedRow[] {
  return rows.map((row) => {
    const record = table.records.get(row.business_id);
    return {
      ...row,
      metrics: { ...row.metrics },
      account_name: keepOrFill(row.account_name, record?.account_name),
      industry: keepOrFill(row.industry, record?.industry),
      territory: keepOrFill(row.territory, record?.territory),
    };
  });
}

export function countMatched(rows: readonly JoinableRow[], table: ReferenceTable): number {
  let matched = 0;
  for (const row of rows) {
    if (table.records.has(row.business_id)) matched += 1;
  }
  return matched;
}
