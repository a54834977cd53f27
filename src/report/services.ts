import type { AppSettings } from "../config/env";
import { optionalEnv } from "../config/env";
import type { LogSink } from "../lib/log";
import { BrowserScreenshotService } from "./browserScreenshot";
import { GeminiDescriptionService } from "./geminiDescription";
import { HostedScreenshotService } from "./hostedScreenshot";
import type { DescriptionService, ScreenshotService } from "./types";

export type ReportServices = {
  screenshotServices: ScreenshotService[];
  descriptionService: DescriptionService | null;
};

/** Services available from the environment, browser first, hosted API as fallback. */
export function createReportServices(settings: AppSettings, log: LogSink = console): ReportServices {
  const screenshotServices: ScreenshotService[] = [];
  const executablePath = optionalEnv("CHROME_EXECUTABLE_PATH");
  if (executablePath) {
    screenshotServices.push(new BrowserScreenshotService({ executablePath, log }));
  }
  if (settings.screenshotApiToken) {
    screenshotServices.push(new HostedScreenshotService(settings.screenshotApiToken));
  }
  if (!screenshotServices.length) {
    log.warn("[report] no screenshot service configured; slides keep the placeholder image");
  }

  const apiKey = optionalEnv("GEMINI_API_KEY");
  if (!apiKey) {
    log.warn("[report] GEMINI_API_KEY not set; slides use the fallback description");
  }
  return {
    screenshotServices,
    descriptionService: apiKey ? new GeminiDescriptionService({ apiKey, model: settings.geminiModel }) : null,
  };
}
