import type { AnalysisRequest } from "../pipeline/runAnalysis";

export function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

export function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

export function getIntArg(flag: string): number | undefined {
  const raw = getArg(flag);
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${flag}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

export function readAnalysisRequest(): AnalysisRequest {
  return {
    caseType: getArg("--case-type") ?? "",
    industry: getArg("--industry"),
    country: getArg("--country"),
    region: getArg("--region"),
    groupByDomain: hasFlag("--group"),
    sortMetric: getArg("--sort"),
    direction: getArg("--dir"),
    limit: getIntArg("--limit"),
  };
}

export const ANALYSIS_FLAGS =
  "--short-video <file> --live-stream <file> --case-type SHORT_VIDEO|LIVE_STREAM [--industry <name>] [--country <territory>] [--region <region>] [--group] [--sort <METRIC>] [--dir ASC|DESC] [--limit N]";
