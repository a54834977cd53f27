export type MetricKind = "COUNT" | "RATE";

export const METRIC_NAMES = [
  "VIDEO_VIEWS",
  "THUMBNAIL_IMPRESSIONS",
  "VIEWTHROUGH_RATE",
  "CLICKTHROUGH_RATE",
  "A2C_RATE",
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type MetricValues = Partial<Record<MetricName, number>>;

export type MetricDefinition = {
  kind: MetricKind;
  column: string;
  required: boolean;
  label: string;
};

// Adding a metric is one entry here plus its name in METRIC_NAMES.
export const METRICS: Record<MetricName, MetricDefinition> = {
  VIDEO_VIEWS: { kind: "COUNT", column: "Video Views", required: true, label: "Video Views" },
  THUMBNAIL_IMPRESSIONS: {
    kind: "COUNT",
    column: "Thumbnail Impressions",
    required: false,
    label: "Thumbnail Impressions",
  },
  VIEWTHROUGH_RATE: { kind: "RATE", column: "Viewthrough Rate", required: false, label: "VTR" },
  CLICKTHROUGH_RATE: { kind: "RATE", column: "Clickthrough Rate", required: false, label: "CTR" },
  A2C_RATE: { kind: "RATE", column: "A2C Rate", required: false, label: "A2C Rate" },
};

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

export function median(values: readonly number[]): number | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

export const REDUCERS: Record<MetricKind, (values: readonly number[]) => number | null> = {
  COUNT: (values) => (values.length ? sum(values) : null),
  RATE: median,
};

export function isMetricName(value: string): value is MetricName {
  return METRIC_NAMES.some((name) => name === value);
}

export function metricValue(metrics: MetricValues, name: MetricName): number | null {
  const value = metrics[name];
  if (value === undefined || Number.isNaN(value)) return null;
  return value;
}

export function formatMetric(name: MetricName, value: number | null | undefined): string {
  if (value === null || value === undefined || Number.isNaN(value)) return "-";
  if (METRICS[name].kind === "RATE") return `${(value * 100).toFixed(2)}%`;
  return Math.round(value).toLocaleString("en-US");
}
