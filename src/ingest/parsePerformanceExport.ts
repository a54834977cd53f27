import fs from "node:fs";
import path from "node:path";
import { ExportsRejectedError, InvalidRowError, MissingColumnError, UploadRejectedError } from "../lib/errors";
import type { InvalidRowReason } from "../lib/errors";
import { METRIC_NAMES, METRICS } from "../metrics/metricKinds";
import type { MetricValues } from "../metrics/metricKinds";
import {
  cellText,
  isBlankRow,
  mapHeaders,
  normalizeHeader,
  parseCount,
  parseRate,
  readFirstSheetMatrix,
  readWorkbook,
} from "./sheetUtils";
import { CASE_TYPE_LABELS } from "./types";
import type { CaseType, PerformanceRow } from "./types";

export type SheetInput = string | { fileName: string; data: Buffer | Uint8Array };

export type PerformanceParseResult = {
  caseType: CaseType;
  rows: PerformanceRow[];
  rejected: InvalidRowError[];
};

export type NormalizedExports = {
  shortVideo: PerformanceRow[];
  liveStream: PerformanceRow[];
  rejected: InvalidRowError[];
  skippedCount: number;
};

export type ParseOptions = {
  maxBytes?: number;
};

export const ALLOWED_EXTENSIONS = ["xlsx", "xls", "csv"] as const;

const DEFAULT_MAX_BYTES = 16 * 1024 * 1024;

type TextField =
  | "page_url"
  | "business_id"
  | "business_name"
  | "business_country"
  | "channel_id"
  | "channel_name";

const TEXT_COLUMNS: Record<TextField, { column: string; aliases: string[] }> = {
  page_url: { column: "Page Url", aliases: ["page url", "page link"] },
  business_id: { column: "Business Id", aliases: ["business id"] },
  business_name: { column: "Business Name", aliases: ["business name"] },
  business_country: { column: "Business Country", aliases: ["business country"] },
  channel_id: { column: "Channel Id", aliases: ["channel id"] },
  channel_name: { column: "Channel Name", aliases: ["channel name"] },
};

const TEXT_FIELDS: TextField[] = [
  "page_url",
  "business_id",
  "business_name",
  "business_country",
  "channel_id",
  "channel_name",
];

function buildAliases(): Record<string, string[]> {
  const aliases: Record<string, string[]> = {};
  for (const field of TEXT_FIELDS) {
    aliases[field] = TEXT_COLUMNS[field].aliases;
  }
  for (const metric of METRIC_NAMES) {
    aliases[metric] = [normalizeHeader(METRICS[metric].column)];
  }
  return aliases;
}

const HEADER_ALIASES = buildAliases();

function requiredColumnsMissing(headerMap: Record<string, number>): string[] {
  const missing: string[] = [];
  for (const field of TEXT_FIELDS) {
    if (headerMap[field] === undefined) missing.push(TEXT_COLUMNS[field].column);
  }
  for (const metric of METRIC_NAMES) {
    if (METRICS[metric].required && headerMap[metric] === undefined) {
      missing.push(METRICS[metric].column);
    }
  }
  return missing;
}

function extensionOf(fileName: string): string {
  return path.extname(fileName).replace(/^\./, "").toLowerCase();
}

function checkUpload(fileName: string, byteLength: number, maxBytes: number) {
  const ext = extensionOf(fileName);
  if (!ALLOWED_EXTENSIONS.some((allowed) => allowed === ext)) {
    throw new UploadRejectedError(
      fileName,
      `Unsupported file type for ${fileName}: expected .${ALLOWED_EXTENSIONS.join(", .")}`
    );
  }
  if (byteLength > maxBytes) {
    throw new UploadRejectedError(
      fileName,
      `${fileName} is ${byteLength} bytes; the upload limit is ${maxBytes} bytes`
    );
  }
}

function readMatrix(fileName: string, data: Buffer | Uint8Array) {
  // CSV is decoded here so non-ASCII text survives without a BOM.
  if (extensionOf(fileName) === "csv") {
    return readFirstSheetMatrix(readWorkbook(Buffer.from(data).toString("utf8"), "string"));
  }
  return readFirstSheetMatrix(readWorkbook(Buffer.from(data), "buffer"));
}

function loadMatrix(input: SheetInput, maxBytes: number) {
  if (typeof input === "string") {
    if (!fs.existsSync(input)) {
      throw new UploadRejectedError(input, `File not found: ${input}`);
    }
    checkUpload(path.basename(input), fs.statSync(input).size, maxBytes);
    return readMatrix(input, fs.readFileSync(input));
  }
  checkUpload(input.fileName, input.data.byteLength, maxBytes);
  return readMatrix(input.fileName, input.data);
}

export function parsePerformanceExport(
  input: SheetInput,
  caseType: CaseType,
  options: ParseOptions = {}
): PerformanceParseResult {
  const source = CASE_TYPE_LABELS[caseType];
  const matrix = loadMatrix(input, options.maxBytes ?? DEFAULT_MAX_BYTES);
  const headers = (matrix[0] ?? []).map((value) => cellText(value));
  const headerMap = mapHeaders(headers, HEADER_ALIASES);

  const missing = requiredColumnsMissing(headerMap);
  if (missing.length) {
    throw new MissingColumnError(source, missing);
  }

  const rows: PerformanceRow[] = [];
  const rejected: InvalidRowError[] = [];

  for (let i = 1; i < matrix.length; i += 1) {
    const row = matrix[i] ?? [];
    if (isBlankRow(row)) continue;

    const text = (field: TextField) => cellText(row[headerMap[field]]);
    const businessId = text("business_id");
    const pageUrl = text("page_url");

    const reasons: InvalidRowReason[] = [];
    if (!businessId) reasons.push("missing_business_id");
    if (!pageUrl) reasons.push("missing_page_url");
    if (reasons.length) {
      rejected.push(new InvalidRowError(source, i + 1, reasons));
      continue;
    }

    const metrics: MetricValues = {};
    for (const metric of METRIC_NAMES) {
      const idx = headerMap[metric];
      if (idx === undefined) continue;
      const parse = METRICS[metric].kind === "RATE" ? parseRate : parseCount;
      const value = parse(row[idx]);
      if (value !== null) metrics[metric] = value;
    }

    rows.push({
      case_type: caseType,
      page_url: pageUrl,
      business_id: businessId,
      business_name: text("business_name"),
      business_country: text("business_country"),
      channel_id: text("channel_id"),
      channel_name: text("channel_name"),
      metrics,
    });
  }

  return { caseType, rows, rejected };
}

// Header problems in one export should not hide those in the other.
function parseOrCollect(
  input: SheetInput,
  caseType: CaseType,
  options: ParseOptions,
  missing: MissingColumnError[]
): PerformanceParseResult | null {
  try {
    return parsePerformanceExport(input, caseType, options);
  } catch (err) {
    if (!(err instanceof MissingColumnError)) throw err;
    missing.push(err);
    return null;
  }
}

export function normalizeExports(
  shortVideoInput: SheetInput,
  liveStreamInput: SheetInput,
  options: ParseOptions = {}
): NormalizedExports {
  const missing: MissingColumnError[] = [];
  const shortVideo = parseOrCollect(shortVideoInput, "SHORT_VIDEO", options, missing);
  const liveStream = parseOrCollect(liveStreamInput, "LIVE_STREAM", options, missing);
  if (!shortVideo || !liveStream) {
    throw missing.length === 1 ? missing[0] : new ExportsRejectedError(missing);
  }
  const rejected = [...shortVideo.rejected, ...liveStream.rejected];

  return {
    shortVideo: shortVideo.rows,
    liveStream: liveStream.rows,
    rejected,
    skippedCount: rejected.length,
  };
}
