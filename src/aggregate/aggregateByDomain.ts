import type { CaseType, JoinedRow } from "../ingest/types";
import { METRIC_NAMES, METRICS, REDUCERS } from "../metrics/metricKinds";
import type { MetricName, MetricValues } from "../metrics/metricKinds";

export type AggregatedGroup = {
  domain: string;
  case_type: CaseType;
  account_name: string;
  business_name: string;
  industry: string;
  territory: string;
  sample_count: number;
  metrics: MetricValues;
};

export type AggregateResult =
  | { grouped: false; rows: JoinedRow[] }
  | { grouped: true; groups: AggregatedGroup[] };

/** Scheme + host of a page URL, lower-cased. Scheme-less URLs are read as https. */
export function extractDomain(pageUrl: string): string {
  const trimmed = pageUrl.trim();
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return trimmed.toLowerCase();
  }
  return url.host ? `${url.protocol}//${url.host}`.toLowerCase() : trimmed.toLowerCase();
}

export function displayHost(domain: string): string {
  return domain.replace(/^[a-z][a-z0-9+.-]*:\/\//i, "").replace(/^www\./i, "");
}

type GroupAccumulator = {
  first: JoinedRow;
  count: number;
  values: Record<MetricName, number[]>;
};

function emptyValues(): Record<MetricName, number[]> {
  return {
    VIDEO_VIEWS: [],
    THUMBNAIL_IMPRESSIONS: [],
    VIEWTHROUGH_RATE: [],
    CLICKTHROUGH_RATE: [],
    A2C_RATE: [],
  };
}

export function groupByDomain(rows: readonly JoinedRow[]): AggregatedGroup[] {
  const byDomain = new Map<string, GroupAccumulator>();

  for (const row of rows) {
    const domain = extractDomain(row.page_url);
    const acc = byDomain.get(domain) ?? { first: row, count: 0, values: emptyValues() };
    acc.count += 1;
    for (const metric of METRIC_NAMES) {
      const value = row.metrics[metric];
      if (value !== undefined && !Number.isNaN(value)) acc.values[metric].push(value);
    }
    byDomain.set(domain, acc);
  }

  return Array.from(byDomain.entries()).map(([domain, acc]) => {
    const metrics: MetricValues = {};
    for (const metric of METRIC_NAMES) {
      const reduced = REDUCERS[METRICS[metric].kind](acc.values[metric]);
      if (reduced !== null) metrics[metric] = reduced;
    }
    return {
      domain,
      case_type: acc.first.case_type,
      account_name: acc.first.account_name,
      business_name: acc.first.business_name,
      industry: acc.first.industry,
      territory: acc.first.territory,
      sample_count: acc.count,
      metrics,
    };
  });
}

export function aggregate(rows: readonly JoinedRow[], groupByDomainFlag: boolean): AggregateResult {
  if (!groupByDomainFlag) return { grouped: false, rows: [...rows] };
  return { grouped: true, groups: groupByDomain(rows) };
}
