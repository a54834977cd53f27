import fs from "node:fs";
import { loadSettings, optionalEnv } from "../config/env";
import type { AppSettings } from "../config/env";
import { getErrorMessage } from "../lib/errors";
import { silentLog } from "../lib/log";
import { referenceLoaderFromEnv } from "../reference/referenceFromEnv";
import { captureDescription } from "../report/capture";
import { GeminiDescriptionService } from "../report/geminiDescription";
import { SlideDeck } from "../report/slideDeck";
import { SlidesTemplateSource } from "../report/templateSource";

type Check = { check: string; ok: boolean; detail: string };

async function run(check: string, fn: () => Promise<string>): Promise<Check> {
  try {
    return { check, ok: true, detail: await fn() };
  } catch (err) {
    return { check, ok: false, detail: getErrorMessage(err) };
  }
}

function envCheck(name: string, required: boolean): Check {
  const value = optionalEnv(name);
  return {
    check: `env ${name}`,
    ok: Boolean(value) || !required,
    detail: value ? "set" : required ? "missing" : "not set (optional)",
  };
}

async function checkTemplate(settings: AppSettings): Promise<string> {
  const source = new SlidesTemplateSource({
    presentationId: optionalEnv("TEMPLATE_SLIDES_ID"),
    cachePath: settings.templatePath,
  });
  const data = await source.load();
  await SlideDeck.load(data, settings.templateSlideIndex);
  return `${settings.templatePath} (${data.length} bytes), slide ${settings.templateSlideIndex} found`;
}

async function checkGemini(settings: AppSettings): Promise<string> {
  const apiKey = optionalEnv("GEMINI_API_KEY");
  if (!apiKey) throw new Error("GEMINI_API_KEY not set");
  const service = new GeminiDescriptionService({ apiKey, model: settings.geminiModel });
  const result = await captureDescription(
    service,
    "Reply with the single word OK.",
    { timeoutMs: settings.captureTimeoutMs },
    silentLog,
    "diagnose"
  );
  if (!result.ok) throw new Error(`${result.reason}: ${result.message}`);
  return `${settings.geminiModel} answered "${result.value.slice(0, 20)}"`;
}

async function checkChrome(): Promise<string> {
  const executablePath = optionalEnv("CHROME_EXECUTABLE_PATH");
  if (!executablePath) throw new Error("CHROME_EXECUTABLE_PATH not set");
  if (!fs.existsSync(executablePath)) throw new Error(`${executablePath} does not exist`);
  return executablePath;
}

async function main() {
  const settings = loadSettings();
  const checks: Check[] = [
    envCheck("REFERENCE_SHEET_ID", true),
    envCheck("TEMPLATE_SLIDES_ID", false),
    envCheck("GEMINI_API_KEY", false),
    envCheck("CHROME_EXECUTABLE_PATH", false),
    envCheck("SCREENSHOT_API_TOKEN", false),
  ];

  checks.push(
    await run("reference sheet", async () => {
      const table = await referenceLoaderFromEnv(settings)();
      return `${table.rowCount} rows, ${table.records.size} business ids, ${table.duplicateIds.length} duplicate(s)`;
    })
  );
  checks.push(await run("slide template", () => checkTemplate(settings)));
  checks.push(await run("language model", () => checkGemini(settings)));
  checks.push(await run("headless browser", checkChrome));

  console.table(checks.map((c) => ({ check: c.check, status: c.ok ? "ok" : "FAIL", detail: c.detail })));
  const failed = checks.filter((c) => !c.ok);
  if (failed.length) {
    console.log(`${failed.length} check(s) failed.`);
    process.exit(1);
  }
  console.log("All checks passed.");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
