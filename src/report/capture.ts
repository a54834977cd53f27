import { getErrorMessage, getErrorStatus } from "../lib/errors";
import type { LogSink } from "../lib/log";
import { TimeoutError, withTimeout } from "../lib/timeout";
import type {
  CaptureOptions,
  CaptureResult,
  DescriptionService,
  FailureReason,
  ScreenshotService,
} from "./types";

export class ServiceHttpError extends Error {
  readonly service: string;
  readonly status: number;

  constructor(service: string, status: number, detail = "") {
    super(`${service} responded with status ${status}${detail ? `: ${detail}` : ""}`);
    this.name = "ServiceHttpError";
    this.service = service;
    this.status = status;
  }
}

export class EmptyOutputError extends Error {
  constructor(service: string) {
    super(`${service} returned no content`);
    this.name = "EmptyOutputError";
  }
}

export function classifyFailure(err: unknown): FailureReason {
  if (err instanceof TimeoutError) return "timeout";
  if (err instanceof EmptyOutputError) return "empty";
  if (err instanceof Error && err.name === "TimeoutError") return "timeout";

  const status = getErrorStatus(err);
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limited";
  if (status !== null && status >= 400) return "service_error";

  const msg = getErrorMessage(err).toLowerCase();
  if (msg.includes("timeout") || msg.includes("timed out")) return "timeout";
  if (msg.includes("api key") || msg.includes("permission denied")) return "auth";
  if (msg.includes("quota") || msg.includes("resource_exhausted")) return "rate_limited";
  if (msg.includes("net::err") || msg.includes("navigat")) return "navigation";
  if (
    msg.includes("fetch failed") ||
    msg.includes("network") ||
    msg.includes("enotfound") ||
    msg.includes("econnreset") ||
    msg.includes("econnrefused")
  ) {
    return "network";
  }
  return "service_error";
}

function failure(reason: FailureReason, message: string): CaptureResult<never> {
  return { ok: false, reason, message };
}

/**
 * Tries each screenshot service in order and returns the first image.
 * The failure reported is the one from the last service tried.
 */
export async function captureScreenshot(
  services: readonly ScreenshotService[],
  url: string,
  options: CaptureOptions,
  log: LogSink
): Promise<CaptureResult<Buffer>> {
  if (!services.length) {
    return failure("not_configured", "No screenshot service configured.");
  }

  let last: CaptureResult<Buffer> = failure("not_configured", "No screenshot service configured.");
  for (const service of services) {
    try {
      const image = await withTimeout(
        service.capture(url, options),
        options.timeoutMs,
        `${service.name} screenshot`
      );
      if (!image.length) throw new EmptyOutputError(service.name);
      return { ok: true, value: image, source: service.name };
    } catch (err) {
      const reason = classifyFailure(err);
      const message = getErrorMessage(err);
      log.warn(`[report] screenshot via ${service.name} failed for ${url} (${reason}): ${message}`);
      last = failure(reason, message);
    }
  }
  return last;
}

export async function captureDescription(
  service: DescriptionService | null,
  prompt: string,
  options: CaptureOptions,
  log: LogSink,
  label: string
): Promise<CaptureResult<string>> {
  if (!service) {
    return failure("not_configured", "No description service configured.");
  }
  try {
    const text = await withTimeout(
      service.generate(prompt, options),
      options.timeoutMs,
      `${service.name} description`
    );
    const trimmed = text.trim();
    if (!trimmed) throw new EmptyOutputError(service.name);
    return { ok: true, value: trimmed, source: service.name };
  } catch (err) {
    const reason = classifyFailure(err);
    const message = getErrorMessage(err);
    log.warn(`[report] description via ${service.name} failed for ${label} (${reason}): ${message}`);
    return failure(reason, message);
  }
}
