import type { FetchLike } from "../reference/fetchReferenceTable";
import { EmptyOutputError, ServiceHttpError } from "./capture";
import { DEFAULT_VIEWPORT } from "./browserScreenshot";
import type { Viewport } from "./browserScreenshot";
import type { CaptureOptions, ScreenshotService } from "./types";

export const SCREENSHOT_API_URL = "https://shot.screenshotapi.net/screenshot";

export function screenshotApiUrl(token: string, target: string, viewport: Viewport): string {
  const params = new URLSearchParams({
    token,
    url: target,
    width: String(viewport.width),
    height: String(viewport.height),
    output: "image",
    file_type: "png",
  });
  return `${SCREENSHOT_API_URL}?${params.toString()}`;
}

/** ScreenshotAPI.net, used when the local browser cannot load a page. */
export class HostedScreenshotService implements ScreenshotService {
  readonly name = "screenshotapi";

  constructor(
    private readonly token: string,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly viewport: Viewport = DEFAULT_VIEWPORT
  ) {}

  async capture(url: string, options: CaptureOptions): Promise<Buffer> {
    const response = await this.fetchImpl(screenshotApiUrl(this.token, url, this.viewport), {
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) throw new ServiceHttpError(this.name, response.status);

    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.startsWith("image/")) {
      throw new ServiceHttpError(this.name, response.status, `unexpected content-type ${contentType || "(none)"}`);
    }
    const image = Buffer.from(await response.arrayBuffer());
    if (!image.length) throw new EmptyOutputError(this.name);
    return image;
  }
}
