import puppeteer from "puppeteer-core";
import type { Browser } from "puppeteer-core";
import { getErrorMessage } from "../lib/errors";
import type { LogSink } from "../lib/log";
import type { CaptureOptions, ScreenshotService } from "./types";

export type Viewport = { width: number; height: number };

export const DEFAULT_VIEWPORT: Viewport = { width: 1280, height: 800 };

export type BrowserScreenshotOptions = {
  executablePath: string;
  viewport?: Viewport;
  log?: LogSink;
};

/**
 * Headless Chrome screenshots. The browser is launched on first use and shared
 * by every capture until `close()`.
 */
export class BrowserScreenshotService implements ScreenshotService {
  readonly name = "browser";
  private browser: Promise<Browser> | null = null;

  constructor(private readonly options: BrowserScreenshotOptions) {}

  private getBrowser(): Promise<Browser> {
    if (this.browser) return this.browser;
    const launch = puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: true,
      args: ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage"],
    });
    this.browser = launch;
    launch.catch(() => {
      if (this.browser === launch) this.browser = null;
    });
    return launch;
  }

  async capture(url: string, options: CaptureOptions): Promise<Buffer> {
    const browser = await this.getBrowser();
    const page = await browser.newPage();
    try {
      await page.setViewport(this.options.viewport ?? DEFAULT_VIEWPORT);
      await page.goto(url, { waitUntil: "networkidle2", timeout: options.timeoutMs });
      const image = await page.screenshot({ type: "png" });
      return Buffer.from(image);
    } finally {
      await page.close().catch((err) => {
        (this.options.log ?? console).warn(`[report] failed to close page for ${url}: ${getErrorMessage(err)}`);
      });
    }
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = null;
    if (!pending) return;
    const browser = await pending;
    await browser.close();
  }
}
