import type { AggregatedGroup } from "../aggregate/aggregateByDomain";
import type { JoinedRow } from "../ingest/types";
import { METRIC_NAMES, METRICS } from "../metrics/metricKinds";

export type ColumnKind = "text" | "number";

export type ExportValue = string | number | null;

export type ExportColumn<T> = {
  key: string;
  header: string;
  kind: ColumnKind;
  get: (item: T) => ExportValue;
};

export type ExportRecord = Record<string, ExportValue>;

function metricColumns<T extends { metrics: JoinedRow["metrics"] }>(): ExportColumn<T>[] {
  return METRIC_NAMES.map((metric) => ({
    key: metric,
    header: METRICS[metric].column,
    kind: "number" as const,
    get: (item: T) => item.metrics[metric] ?? null,
  }));
}

export const ROW_EXPORT_COLUMNS: ExportColumn<JoinedRow>[] = [
  { key: "case_type", header: "Case Type", kind: "text", get: (row) => row.case_type },
  { key: "account_name", header: "Account Name", kind: "text", get: (row) => row.account_name },
  { key: "industry", header: "Industry", kind: "text", get: (row) => row.industry },
  { key: "territory", header: "Territory", kind: "text", get: (row) => row.territory },
  { key: "business_id", header: "Business Id", kind: "text", get: (row) => row.business_id },
  { key: "business_name", header: "Business Name", kind: "text", get: (row) => row.business_name },
  {
    key: "business_country",
    header: "Business Country",
    kind: "text",
    get: (row) => row.business_country,
  },
  { key: "channel_id", header: "Channel Id", kind: "text", get: (row) => row.channel_id },
  { key: "channel_name", header: "Channel Name", kind: "text", get: (row) => row.channel_name },
  { key: "page_url", header: "Page Url", kind: "text", get: (row) => row.page_url },
  ...metricColumns<JoinedRow>(),
];

export const GROUP_EXPORT_COLUMNS: ExportColumn<AggregatedGroup>[] = [
  { key: "domain", header: "Domain", kind: "text", get: (group) => group.domain },
  { key: "case_type", header: "Case Type", kind: "text", get: (group) => group.case_type },
  { key: "account_name", header: "Account Name", kind: "text", get: (group) => group.account_name },
  { key: "business_name", header: "Business Name", kind: "text", get: (group) => group.business_name },
  { key: "industry", header: "Industry", kind: "text", get: (group) => group.industry },
  { key: "territory", header: "Territory", kind: "text", get: (group) => group.territory },
  { key: "sample_count", header: "Sample Count", kind: "number", get: (group) => group.sample_count },
  ...metricColumns<AggregatedGroup>(),
];

export function toExportRecord<T>(item: T, columns: readonly ExportColumn<T>[]): ExportRecord {
  const record: ExportRecord = {};
  for (const column of columns) {
    record[column.key] = column.get(item);
  }
  return record;
}
