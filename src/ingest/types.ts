import type { MetricValues } from "../metrics/metricKinds";

export const CASE_TYPES = ["SHORT_VIDEO", "LIVE_STREAM"] as const;

export type CaseType = (typeof CASE_TYPES)[number];

export const CASE_TYPE_LABELS: Record<CaseType, string> = {
  SHORT_VIDEO: "Short video",
  LIVE_STREAM: "Live stream",
};

export type PerformanceRow = {
  case_type: CaseType;
  page_url: string;
  business_id: string;
  business_name: string;
  business_country: string;
  channel_id: string;
  channel_name: string;
  metrics: MetricValues;
};

export type ReferenceFields = {
  account_name: string;
  industry: string;
  territory: string;
};

export type JoinedRow = PerformanceRow & ReferenceFields;

export function isCaseType(value: string): value is CaseType {
  return CASE_TYPES.some((caseType) => caseType === value);
}
