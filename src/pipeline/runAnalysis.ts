import { aggregate } from "../aggregate/aggregateByDomain";
import type { AggregatedGroup } from "../aggregate/aggregateByDomain";
import { filterRows } from "../filter/filterRows";
import type { FilterCriteria } from "../filter/filterRows";
import type { NormalizedExports } from "../ingest/parsePerformanceExport";
import type { JoinedRow } from "../ingest/types";
import { countMatched, joinReference } from "../reference/joinReference";
import type { ReferenceTable } from "../reference/parseReferenceTable";
import { rankRows } from "../rank/rankRows";

export type AnalysisRequest = FilterCriteria & {
  groupByDomain?: boolean;
  sortMetric?: string;
  direction?: string;
  limit?: number;
};

export type AnalysisStats = {
  inputRows: number;
  matchedReference: number;
  filteredRows: number;
  skippedRows: number;
};

export type AnalysisResult =
  | { grouped: false; rows: JoinedRow[]; stats: AnalysisStats }
  | { grouped: true; groups: AggregatedGroup[]; stats: AnalysisStats };

export const DEFAULT_SORT_METRIC = "VIDEO_VIEWS";

export function runAnalysis(
  exports: NormalizedExports,
  table: ReferenceTable,
  request: AnalysisRequest
): AnalysisResult {
  const combined = [...exports.shortVideo, ...exports.liveStream];
  const joined = joinReference(combined, table);
  const filtered = filterRows(joined, request);
  const aggregated = aggregate(filtered, request.groupByDomain ?? false);

  const rankOptions = {
    metric: request.sortMetric ?? DEFAULT_SORT_METRIC,
    direction: request.direction,
    limit: request.limit,
  };
  const stats: AnalysisStats = {
    inputRows: combined.length,
    matchedReference: countMatched(combined, table),
    filteredRows: filtered.length,
    skippedRows: exports.skippedCount,
  };

  if (aggregated.grouped) {
    return { grouped: true, groups: rankRows(aggregated.groups, rankOptions), stats };
  }
  return { grouped: false, rows: rankRows(aggregated.rows, rankOptions), stats };
}
