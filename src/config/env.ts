import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

export type EnvName =
  | "REFERENCE_SHEET_ID"
  | "TEMPLATE_SLIDES_ID"
  | "GEMINI_API_KEY"
  | "CHROME_EXECUTABLE_PATH";

export function requireEnv(name: EnvName): string {
  const value = process.env[name];
  if (!value || value.trim() === "") {
    throw new Error(`Missing ${name}. Put it in .env.local`);
  }
  return value.trim();
}

export function optionalEnv(name: string): string | undefined {
  const value = process.env[name];
  if (!value || value.trim() === "") return undefined;
  return value.trim();
}

function intEnv(name: string, fallback: number): number {
  const raw = optionalEnv(name);
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return parsed;
}

export type DuplicatePolicy = "last_write_wins" | "first_write_wins";
export type ReportLanguage = "ja" | "en";

export type AppSettings = {
  referenceSheetGid: string;
  referenceDuplicatePolicy: DuplicatePolicy;
  templatePath: string;
  templateSlideIndex: number;
  geminiModel: string;
  screenshotApiToken: string | undefined;
  reportConcurrency: number;
  captureTimeoutMs: number;
  maxUploadBytes: number;
  reportLanguage: ReportLanguage;
};

function parseDuplicatePolicy(raw: string | undefined): DuplicatePolicy {
  if (!raw) return "last_write_wins";
  if (raw === "last_write_wins" || raw === "first_write_wins") return raw;
  throw new Error(
    `Invalid REFERENCE_DUPLICATE_POLICY: "${raw}" (expected last_write_wins or first_write_wins)`
  );
}

function parseLanguage(raw: string | undefined): ReportLanguage {
  if (!raw) return "ja";
  if (raw === "ja" || raw === "en") return raw;
  throw new Error(`Invalid REPORT_LANGUAGE: "${raw}" (expected ja or en)`);
}

export function loadSettings(): AppSettings {
  return {
    referenceSheetGid: optionalEnv("REFERENCE_SHEET_GID") ?? "0",
    referenceDuplicatePolicy: parseDuplicatePolicy(optionalEnv("REFERENCE_DUPLICATE_POLICY")),
    templatePath: optionalEnv("TEMPLATE_PATH") ?? "Template.pptx",
    templateSlideIndex: intEnv("TEMPLATE_SLIDE_INDEX", 1),
    geminiModel: optionalEnv("GEMINI_MODEL") ?? "gemini-2.0-flash",
    screenshotApiToken: optionalEnv("SCREENSHOT_API_TOKEN"),
    reportConcurrency: intEnv("REPORT_CONCURRENCY", 3),
    captureTimeoutMs: intEnv("CAPTURE_TIMEOUT_MS", 30_000),
    maxUploadBytes: intEnv("MAX_UPLOAD_BYTES", 16 * 1024 * 1024),
    reportLanguage: parseLanguage(optionalEnv("REPORT_LANGUAGE")),
  };
}
