import { PipelineError } from "../lib/errors";
import { normalizeExports } from "../ingest/parsePerformanceExport";
import type { NormalizedExports, ParseOptions, SheetInput } from "../ingest/parsePerformanceExport";
import { listFilterOptions } from "../filter/filterRows";
import type { FilterOptions } from "../filter/filterRows";
import { ReferenceCache } from "../reference/referenceCache";
import type { ReferenceTable } from "../reference/parseReferenceTable";
import { runAnalysis } from "../pipeline/runAnalysis";
import type { AnalysisRequest, AnalysisResult } from "../pipeline/runAnalysis";

/**
 * One upload's worth of state: the two normalized exports and the reference
 * table cache. A new upload replaces the exports and drops the cached table.
 */
export class AnalysisSession {
  readonly reference: ReferenceCache;
  private exports: NormalizedExports | null = null;

  constructor(
    loadReference: () => Promise<ReferenceTable>,
    private readonly parseOptions: ParseOptions = {}
  ) {
    this.reference = new ReferenceCache(loadReference);
  }

  loadUpload(shortVideo: SheetInput, liveStream: SheetInput): NormalizedExports {
    const normalized = normalizeExports(shortVideo, liveStream, this.parseOptions);
    this.exports = normalized;
    this.reference.invalidate();
    return normalized;
  }

  get hasUpload(): boolean {
    return this.exports !== null;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    if (!this.exports) {
      throw new PipelineError("no_upload", "validation", "Upload both exports before analyzing.");
    }
    const table = await this.reference.get();
    return runAnalysis(this.exports, table, request);
  }

  async filterOptions(): Promise<FilterOptions> {
    return listFilterOptions(await this.reference.get());
  }
}
