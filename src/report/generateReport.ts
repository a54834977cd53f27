import type { AggregatedGroup } from "../aggregate/aggregateByDomain";
import { displayHost, extractDomain } from "../aggregate/aggregateByDomain";
import type { ReportLanguage } from "../config/env";
import { CASE_TYPE_LABELS } from "../ingest/types";
import type { JoinedRow } from "../ingest/types";
import { getErrorMessage, ReportCancelledError } from "../lib/errors";
import type { LogSink } from "../lib/log";
import { runWithConcurrency } from "../lib/runWithConcurrency";
import { formatMetric, METRIC_NAMES } from "../metrics/metricKinds";
import { captureDescription, captureScreenshot } from "./capture";
import { buildDescriptionPrompt, fallbackDescription } from "./descriptionPrompt";
import { fetchPageContext } from "./pageContext";
import type { PageContext } from "./pageContext";
import { DESCRIPTION_FIELD, SlideDeck } from "./slideDeck";
import type { TemplateSource } from "./templateSource";
import { artifactStatus } from "./types";
import type { DescriptionService, ReportArtifact, ReportCase, ScreenshotService } from "./types";

export type ReportMode = "combined" | "per_case";

export type GenerateReportOptions = {
  template: TemplateSource;
  templateSlideIndex?: number;
  screenshotServices?: readonly ScreenshotService[];
  descriptionService?: DescriptionService | null;
  pageContext?: (url: string, timeoutMs: number) => Promise<PageContext | null>;
  language?: ReportLanguage;
  concurrency?: number;
  timeoutMs?: number;
  mode?: ReportMode;
  signal?: AbortSignal;
  log?: LogSink;
};

export type ReportDocument = {
  fileName: string;
  domains: string[];
  data: Buffer;
};

export type ReportResult = {
  documents: ReportDocument[];
  artifacts: ReportArtifact[];
};

export const COMBINED_REPORT_NAME = "case-studies.pptx";

export function toReportCase(item: JoinedRow | AggregatedGroup): ReportCase {
  if ("domain" in item) {
    return {
      domain: item.domain,
      host: displayHost(item.domain),
      company_name: item.account_name || item.business_name,
      industry: item.industry,
      territory: item.territory,
      case_type: item.case_type,
      sample_count: item.sample_count,
      metrics: item.metrics,
    };
  }
  const domain = extractDomain(item.page_url);
  return {
    domain,
    host: displayHost(domain),
    company_name: item.account_name || item.business_name,
    industry: item.industry,
    territory: item.territory,
    case_type: item.case_type,
    sample_count: 1,
    metrics: item.metrics,
  };
}

/** One case per domain, in selection order; the first occurrence wins. */
export function toReportCases(items: ReadonlyArray<JoinedRow | AggregatedGroup>): ReportCase[] {
  const seen = new Set<string>();
  const cases: ReportCase[] = [];
  for (const item of items) {
    const reportCase = toReportCase(item);
    if (seen.has(reportCase.domain)) continue;
    seen.add(reportCase.domain);
    cases.push(reportCase);
  }
  return cases;
}

export function slideFields(artifact: ReportArtifact): Record<string, string> {
  const c = artifact.case;
  const fields: Record<string, string> = {
    company_name: c.company_name || c.host,
    domain: c.domain,
    host: c.host,
    industry: c.industry || "-",
    territory: c.territory || "-",
    case_type: CASE_TYPE_LABELS[c.case_type],
    sample_count: String(c.sample_count),
    [DESCRIPTION_FIELD]: artifact.descriptionText,
  };
  for (const metric of METRIC_NAMES) {
    fields[metric.toLowerCase()] = formatMetric(metric, c.metrics[metric]);
  }
  return fields;
}

/**
 * `<host>.pptx`, numbered when two domains share a host (scheme or `www.`
 * differ) so no deck overwrites another.
 */
function fileNameFor(reportCase: ReportCase, used: Set<string>): string {
  const slug = reportCase.host.toLowerCase().replace(/[^a-z0-9.-]+/g, "-").replace(/^-+|-+$/g, "") || "case";
  let fileName = `${slug}.pptx`;
  for (let n = 2; used.has(fileName); n += 1) {
    fileName = `${slug}-${n}.pptx`;
  }
  used.add(fileName);
  return fileName;
}

async function closeServices(services: readonly ScreenshotService[], log: LogSink) {
  for (const service of services) {
    if (!service.close) continue;
    try {
      await service.close();
    } catch (err) {
      log.warn(`[report] failed to close ${service.name}: ${getErrorMessage(err)}`);
    }
  }
}

async function buildDeck(
  template: Buffer,
  slideIndex: number,
  artifacts: readonly ReportArtifact[]
): Promise<Buffer> {
  const deck = await SlideDeck.load(template, slideIndex);
  for (const artifact of artifacts) {
    deck.addSlide({
      fields: slideFields(artifact),
      image: artifact.screenshot.ok ? artifact.screenshot.value : null,
    });
  }
  return deck.toBuffer();
}

/**
 * Captures a screenshot and a description for each case, then writes the
 * slides. Capture failures degrade the slide; only template problems and
 * cancellation reject.
 */
export async function generateReport(
  input: ReadonlyArray<JoinedRow | AggregatedGroup>,
  options: GenerateReportOptions
): Promise<ReportResult> {
  const log = options.log ?? console;
  const language = options.language ?? "ja";
  const timeoutMs = options.timeoutMs ?? 30_000;
  const slideIndex = options.templateSlideIndex ?? 1;
  const screenshotServices = options.screenshotServices ?? [];
  const descriptionService = options.descriptionService ?? null;
  const pageContext =
    options.pageContext ?? ((url: string, ms: number) => fetchPageContext(url, { timeoutMs: ms, log }));

  const cases = toReportCases(input);
  const template = await options.template.load();
  // Fail on a broken template before spending any capture calls.
  await SlideDeck.load(template, slideIndex);

  if (!cases.length) return { documents: [], artifacts: [] };
  if (options.signal?.aborted) throw new ReportCancelledError(0);

  const captureCase = async (reportCase: ReportCase): Promise<ReportArtifact> => {
    const describe = async () => {
      if (!descriptionService) {
        return captureDescription(null, "", { timeoutMs }, log, reportCase.host);
      }
      const context = await pageContext(reportCase.domain, timeoutMs).catch((err) => {
        log.warn(`[report] page context for ${reportCase.host} unavailable: ${getErrorMessage(err)}`);
        return null;
      });
      const prompt = buildDescriptionPrompt(reportCase, context, language);
      return captureDescription(descriptionService, prompt, { timeoutMs }, log, reportCase.host);
    };

    const [screenshot, description] = await Promise.all([
      captureScreenshot(screenshotServices, reportCase.domain, { timeoutMs }, log),
      describe(),
    ]);
    const status = artifactStatus(screenshot.ok, description.ok);
    log.log(`[report] ${reportCase.host}: ${status}`);
    return {
      case: reportCase,
      screenshot,
      description,
      descriptionText: description.ok ? description.value : fallbackDescription(language),
      status,
    };
  };

  const pool = await runWithConcurrency(cases, options.concurrency ?? 3, captureCase, options.signal).finally(
    () => closeServices(screenshotServices, log)
  );

  const artifacts = pool.results.filter((artifact): artifact is ReportArtifact => artifact !== undefined);
  if (pool.aborted) throw new ReportCancelledError(artifacts.length);

  if ((options.mode ?? "combined") === "combined") {
    const data = await buildDeck(template, slideIndex, artifacts);
    return {
      documents: [{ fileName: COMBINED_REPORT_NAME, domains: artifacts.map((a) => a.case.domain), data }],
      artifacts,
    };
  }

  const documents: ReportDocument[] = [];
  const usedNames = new Set<string>();
  for (const artifact of artifacts) {
    documents.push({
      fileName: fileNameFor(artifact.case, usedNames),
      domains: [artifact.case.domain],
      data: await buildDeck(template, slideIndex, [artifact]),
    });
  }
  return { documents, artifacts };
}
