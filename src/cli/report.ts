import fs from "node:fs";
import path from "node:path";
import type { AggregatedGroup } from "../aggregate/aggregateByDomain";
import { loadSettings, optionalEnv } from "../config/env";
import type { ReportLanguage } from "../config/env";
import type { JoinedRow } from "../ingest/types";
import { ReportCancelledError } from "../lib/errors";
import { referenceLoaderFromEnv } from "../reference/referenceFromEnv";
import { generateReport } from "../report/generateReport";
import type { ReportMode } from "../report/generateReport";
import { createReportServices } from "../report/services";
import { SlidesTemplateSource } from "../report/templateSource";
import { AnalysisSession } from "../session/analysisSession";
import { ANALYSIS_FLAGS, getArg, getIntArg, readAnalysisRequest } from "./_args";

function usage() {
  console.log(
    `Usage: npm run report -- ${ANALYSIS_FLAGS} [--top 10] [--domains a.com,b.com] [--mode combined|per_case] [--lang ja|en] [--out-dir out/report]`
  );
}

function parseMode(raw: string | undefined): ReportMode {
  if (!raw || raw === "combined") return "combined";
  if (raw === "per_case") return raw;
  throw new Error(`Invalid --mode: "${raw}" (expected combined or per_case)`);
}

function parseLanguage(raw: string | undefined, fallback: ReportLanguage): ReportLanguage {
  if (!raw) return fallback;
  if (raw === "ja" || raw === "en") return raw;
  throw new Error(`Invalid --lang: "${raw}" (expected ja or en)`);
}

async function main() {
  const shortVideo = getArg("--short-video");
  const liveStream = getArg("--live-stream");
  if (!shortVideo || !liveStream) {
    usage();
    process.exit(1);
  }

  const settings = loadSettings();
  const mode = parseMode(getArg("--mode"));
  const language = parseLanguage(getArg("--lang"), settings.reportLanguage);
  const top = getIntArg("--top") ?? 10;
  const wanted = (getArg("--domains") ?? "")
    .split(",")
    .map((domain) => domain.trim().toLowerCase())
    .filter(Boolean);

  const session = new AnalysisSession(referenceLoaderFromEnv(settings), {
    maxBytes: settings.maxUploadBytes,
  });
  session.loadUpload(shortVideo, liveStream);
  const result = await session.analyze(readAnalysisRequest());
  const items: Array<JoinedRow | AggregatedGroup> = result.grouped ? result.groups : result.rows;
  const selected = wanted.length
    ? items.filter((item) => {
        const domain = "domain" in item ? item.domain : item.page_url.toLowerCase();
        return wanted.some((w) => domain.includes(w));
      })
    : items.slice(0, top);
  console.log(`[report] ${selected.length} case(s) selected from ${items.length}`);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("[report] cancelling; waiting for in-flight captures");
    controller.abort();
  });

  const services = createReportServices(settings);
  const report = await generateReport(selected, {
    template: new SlidesTemplateSource({
      presentationId: optionalEnv("TEMPLATE_SLIDES_ID"),
      cachePath: settings.templatePath,
    }),
    templateSlideIndex: settings.templateSlideIndex,
    screenshotServices: services.screenshotServices,
    descriptionService: services.descriptionService,
    language,
    concurrency: settings.reportConcurrency,
    timeoutMs: settings.captureTimeoutMs,
    mode,
    signal: controller.signal,
  });

  const outDir = path.resolve(process.cwd(), getArg("--out-dir") ?? path.join("out", "report"));
  fs.mkdirSync(outDir, { recursive: true });
  for (const doc of report.documents) {
    const outPath = path.join(outDir, doc.fileName);
    fs.writeFileSync(outPath, doc.data);
    console.log(`Wrote ${outPath} (${doc.domains.length} slide(s))`);
  }

  console.table(
    report.artifacts.map((artifact) => ({
      domain: artifact.case.domain,
      status: artifact.status,
      screenshot: artifact.screenshot.ok ? artifact.screenshot.source : artifact.screenshot.reason,
      description: artifact.description.ok ? artifact.description.source : artifact.description.reason,
    }))
  );
}

main().catch((err) => {
  if (err instanceof ReportCancelledError) {
    console.error(`[report] ${err.message}`);
    process.exit(130);
  }
  console.error(err);
  process.exit(1);
});
