import fs from "node:fs";
import path from "node:path";
import { getErrorMessage, TemplateUnavailableError } from "../lib/errors";
import type { LogSink } from "../lib/log";
import type { FetchLike } from "../reference/fetchReferenceTable";

/** Exports smaller than this are usually a sign-in page or an empty deck. */
export const SUSPICIOUS_TEMPLATE_BYTES = 1024 * 1024;

export interface TemplateSource {
  load(): Promise<Buffer>;
}

export function slidesExportUrl(presentationId: string): string {
  return `https://docs.google.com/presentation/d/${encodeURIComponent(presentationId)}/export/pptx`;
}

export function isZipArchive(data: Buffer): boolean {
  return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b && data[2] === 0x03 && data[3] === 0x04;
}

export class FileTemplateSource implements TemplateSource {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Buffer> {
    if (!fs.existsSync(this.filePath)) {
      throw new TemplateUnavailableError("not_found", `Template not found: ${this.filePath}`);
    }
    const data = await fs.promises.readFile(this.filePath);
    if (!isZipArchive(data)) {
      throw new TemplateUnavailableError("invalid", `Template is not a .pptx file: ${this.filePath}`);
    }
    return data;
  }
}

export type DownloadTemplateOptions = {
  presentationId: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  log?: LogSink;
};

export async function downloadTemplate(options: DownloadTemplateOptions): Promise<Buffer> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = slidesExportUrl(options.presentationId);

  let response: Response;
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs ?? 60_000) });
  } catch (err) {
    throw new TemplateUnavailableError("network", `Template download failed: ${getErrorMessage(err)}`);
  }

  if (response.status === 404) {
    throw new TemplateUnavailableError("not_found", "Template presentation not found (404).", 404);
  }
  if (response.status === 401 || response.status === 403) {
    throw new TemplateUnavailableError(
      "access_denied",
      `Template presentation access denied (${response.status}). Share it as "anyone with the link can view".`,
      response.status
    );
  }
  if (!response.ok) {
    throw new TemplateUnavailableError(
      "http_error",
      `Template download failed with status ${response.status}.`,
      response.status
    );
  }

  let data: Buffer;
  try {
    data = Buffer.from(await response.arrayBuffer());
  } catch (err) {
    throw new TemplateUnavailableError(
      "network",
      `Template download was interrupted: ${getErrorMessage(err)}`,
      response.status
    );
  }
  if (!isZipArchive(data)) {
    throw new TemplateUnavailableError(
      "access_denied",
      "Template download did not return a .pptx file. Check the presentation's sharing settings.",
      response.status
    );
  }
  if (data.length < SUSPICIOUS_TEMPLATE_BYTES) {
    (options.log ?? console).warn(
      `[template] downloaded template is only ${data.length} bytes; check that the right presentation is shared`
    );
  }
  return data;
}

export type SlidesTemplateSourceOptions = Omit<DownloadTemplateOptions, "presentationId"> & {
  presentationId: string | undefined;
  cachePath: string;
};

/**
 * Reads the template from `cachePath`, downloading the Slides export there
 * the first time. The bytes are kept in memory after the first load.
 */
export class SlidesTemplateSource implements TemplateSource {
  private cached: Buffer | null = null;

  constructor(private readonly options: SlidesTemplateSourceOptions) {}

  async load(): Promise<Buffer> {
    if (this.cached) return this.cached;

    const { cachePath, presentationId } = this.options;
    if (fs.existsSync(cachePath)) {
      this.cached = await new FileTemplateSource(cachePath).load();
      return this.cached;
    }
    if (!presentationId) {
      throw new TemplateUnavailableError(
        "not_configured",
        `No template at ${cachePath} and TEMPLATE_SLIDES_ID is not set.`
      );
    }

    const data = await downloadTemplate({ ...this.options, presentationId });
    await fs.promises.mkdir(path.dirname(path.resolve(cachePath)), { recursive: true });
    await fs.promises.writeFile(cachePath, data);
    (this.options.log ?? console).log(`[template] cached ${data.length} bytes at ${cachePath}`);
    this.cached = data;
    return data;
  }
}
