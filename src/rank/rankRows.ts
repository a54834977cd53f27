import { FilterInputError, UnknownMetricError } from "../lib/errors";
import { isMetricName, METRIC_NAMES, metricValue } from "../metrics/metricKinds";
import type { MetricName, MetricValues } from "../metrics/metricKinds";

export type SortDirection = "ASC" | "DESC";

export type RankOptions = {
  metric: string;
  direction?: string;
  limit?: number;
};

export type Rankable = { metrics: MetricValues };

export function resolveSortMetric(raw: string): MetricName {
  const value = raw.trim().toUpperCase();
  if (!isMetricName(value)) throw new UnknownMetricError(raw, METRIC_NAMES);
  return value;
}

export function resolveDirection(raw: string | undefined): SortDirection {
  const value = (raw ?? "DESC").trim().toUpperCase();
  if (value === "ASC" || value === "DESC") return value;
  throw new FilterInputError("direction", raw ?? "", `Invalid sort direction "${raw}". Expected ASC or DESC`);
}

// Missing values sink below present ones in both directions.
export const compareNullableNumber = (
  a: number | null,
  b: number | null,
  dir: SortDirection
): number => {
  const bMissing = b === null || Number.isNaN(b);
  if (a === null || Number.isNaN(a)) return bMissing ? 0 : 1;
  if (bMissing) return -1;
  return dir === "ASC" ? a - b : b - a;
};

export function rankRows<T extends Rankable>(items: readonly T[], options: RankOptions): T[] {
  const metric = resolveSortMetric(options.metric);
  const direction = resolveDirection(options.direction);

  const ranked = items
    .map((item, index) => ({ item, index, value: metricValue(item.metrics, metric) }))
    .sort((a, b) => compareNullableNumber(a.value, b.value, direction) || a.index - b.index)
    .map((entry) => entry.item);

  if (options.limit !== undefined && options.limit >= 0) return ranked.slice(0, options.limit);
  return ranked;
}
