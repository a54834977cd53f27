import type { CaseType } from "../ingest/types";
import type { MetricValues } from "../metrics/metricKinds";

export type FailureReason =
  | "timeout"
  | "auth"
  | "rate_limited"
  | "service_error"
  | "network"
  | "navigation"
  | "empty"
  | "not_configured";

export type CaptureResult<T> =
  | { ok: true; value: T; source: string }
  | { ok: false; reason: FailureReason; message: string };

export type ReportCase = {
  domain: string;
  host: string;
  company_name: string;
  industry: string;
  territory: string;
  case_type: CaseType;
  sample_count: number;
  metrics: MetricValues;
};

export type ArtifactStatus = "complete" | "partial" | "fallback";

export type ReportArtifact = {
  case: ReportCase;
  screenshot: CaptureResult<Buffer>;
  description: CaptureResult<string>;
  /** Text that lands on the slide: the generated description or the fallback. */
  descriptionText: string;
  status: ArtifactStatus;
};

export type CaptureOptions = {
  timeoutMs: number;
};

export interface ScreenshotService {
  readonly name: string;
  capture(url: string, options: CaptureOptions): Promise<Buffer>;
  close?(): Promise<void>;
}

export interface DescriptionService {
  readonly name: string;
  generate(prompt: string, options: CaptureOptions): Promise<string>;
}

export function artifactStatus(screenshotOk: boolean, descriptionOk: boolean): ArtifactStatus {
  if (screenshotOk && descriptionOk) return "complete";
  if (screenshotOk || descriptionOk) return "partial";
  return "fallback";
}
