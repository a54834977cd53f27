import { beforeEach, describe, it, expect, vi } from "vitest";
import { BrowserScreenshotService } from "../src/report/browserScreenshot";
import { EmptyOutputError, ServiceHttpError } from "../src/report/capture";
import { HostedScreenshotService } from "../src/report/hostedScreenshot";
import { silentLog } from "../src/lib/log";

const { launch } = vi.hoisted(() => ({ launch: vi.fn() }));

vi.mock("puppeteer-core", () => ({
  default: { launch },
}));

function fakePage(goto: () => Promise<unknown> = async () => null) {
  return {
    setViewport: vi.fn(async () => undefined),
    goto: vi.fn(goto),
    screenshot: vi.fn(async () => new Uint8Array([1, 2, 3])),
    close: vi.fn(async () => undefined),
  };
}

function fakeBrowser(pages: ReturnType<typeof fakePage>[]) {
  const queue = [...pages];
  return {
    newPage: vi.fn(async () => queue.shift() ?? fakePage()),
    close: vi.fn(async () => undefined),
  };
}

describe("BrowserScreenshotService", () => {
  beforeEach(() => {
    launch.mockReset();
  });

  it("captures a png at the default viewport and closes the page", async () => {
    const page = fakePage();
    launch.mockResolvedValue(fakeBrowser([page]));
    const service = new BrowserScreenshotService({ executablePath: "/usr/bin/chrome", log: silentLog });

    const image = await service.capture("https://shop.example", { timeoutMs: 5000 });

    expect(image).toEqual(Buffer.from([1, 2, 3]));
    expect(launch).toHaveBeenCalledWith(expect.objectContaining({ executablePath: "/usr/bin/chrome", headless: true }));
    expect(page.setViewport).toHaveBeenCalledWith({ width: 1280, height: 800 });
    expect(page.goto).toHaveBeenCalledWith("https://shop.example", { waitUntil: "networkidle2", timeout: 5000 });
    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it("closes the page when navigation fails", async () => {
    const page = fakePage(async () => {
      throw new Error("net::ERR_NAME_NOT_RESOLVED");
    });
    launch.mockResolvedValue(fakeBrowser([page]));
    const service = new BrowserScreenshotService({ executablePath: "/usr/bin/chrome", log: silentLog });

    await expect(service.capture("https://missing.example", { timeoutMs: 5000 })).rejects.toThrow(
      "net::ERR_NAME_NOT_RESOLVED"
    );
    expect(page.screenshot).not.toHaveBeenCalled();
    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it("shares one browser across captures and closes it once", async () => {
    const browser = fakeBrowser([fakePage(), fakePage()]);
    launch.mockResolvedValue(browser);
    const service = new BrowserScreenshotService({ executablePath: "/usr/bin/chrome", log: silentLog });

    await service.capture("https://a.example", { timeoutMs: 5000 });
    await service.capture("https://b.example", { timeoutMs: 5000 });
    await service.close();
    await service.close();

    expect(launch).toHaveBeenCalledTimes(1);
    expect(browser.newPage).toHaveBeenCalledTimes(2);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("does not launch a browser just to close it", async () => {
    const service = new BrowserScreenshotService({ executablePath: "/usr/bin/chrome", log: silentLog });

    await service.close();

    expect(launch).not.toHaveBeenCalled();
  });

  it("launches again after a failed launch", async () => {
    launch.mockRejectedValueOnce(new Error("Failed to launch the browser process")).mockResolvedValue(fakeBrowser([]));
    const service = new BrowserScreenshotService({ executablePath: "/usr/bin/chrome", log: silentLog });

    await expect(service.capture("https://a.example", { timeoutMs: 5000 })).rejects.toThrow(
      "Failed to launch the browser process"
    );
    const image = await service.capture("https://a.example", { timeoutMs: 5000 });

    expect(image).toEqual(Buffer.from([1, 2, 3]));
    expect(launch).toHaveBeenCalledTimes(2);
  });
});

describe("HostedScreenshotService", () => {
  it("returns the image body", async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValue(new Response(Buffer.from([9, 8, 7]), { headers: { "content-type": "image/png" } }));
    const service = new HostedScreenshotService("test-token", fetchImpl);

    const image = await service.capture("https://shop.example", { timeoutMs: 5000 });

    expect(image).toEqual(Buffer.from([9, 8, 7]));
    expect(fetchImpl.mock.calls[0][0]).toContain("token=test-token");
  });

  it("throws ServiceHttpError for a non-OK status", async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response("boom", { status: 500 }));
    const service = new HostedScreenshotService("test-token", fetchImpl);

    const err = await service.capture("https://shop.example", { timeoutMs: 5000 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceHttpError);
    expect(err).toMatchObject({ service: "screenshotapi", status: 500, message: "screenshotapi responded with status 500" });
  });

  it("rejects an html answer in place of an image", async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValue(new Response("<html></html>", { status: 200, headers: { "content-type": "text/html" } }));
    const service = new HostedScreenshotService("test-token", fetchImpl);

    await expect(service.capture("https://shop.example", { timeoutMs: 5000 })).rejects.toThrow(
      "screenshotapi responded with status 200: unexpected content-type text/html"
    );
  });

  it("treats an empty image as empty output", async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValue(new Response(new Uint8Array(0), { headers: { "content-type": "image/png" } }));
    const service = new HostedScreenshotService("test-token", fetchImpl);

    await expect(service.capture("https://shop.example", { timeoutMs: 5000 })).rejects.toBeInstanceOf(EmptyOutputError);
  });
});
