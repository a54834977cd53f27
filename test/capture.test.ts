import { describe, it, expect, vi } from "vitest";
import { silentLog } from "../src/lib/log";
import { runWithConcurrency } from "../src/lib/runWithConcurrency";
import { TimeoutError, withTimeout } from "../src/lib/timeout";
import { captureDescription, classifyFailure, EmptyOutputError, ServiceHttpError } from "../src/report/capture";
import { extractPageContext, fetchPageContext } from "../src/report/pageContext";
import { screenshotApiUrl } from "../src/report/hostedScreenshot";

describe("classifyFailure", () => {
  it("maps statuses and messages to failure reasons", () => {
    expect(classifyFailure(new ServiceHttpError("llm", 401))).toBe("auth");
    expect(classifyFailure(new ServiceHttpError("llm", 403))).toBe("auth");
    expect(classifyFailure(new ServiceHttpError("llm", 429))).toBe("rate_limited");
    expect(classifyFailure(new ServiceHttpError("llm", 500))).toBe("service_error");
    expect(classifyFailure(new TimeoutError("capture", 10))).toBe("timeout");
    expect(classifyFailure(new EmptyOutputError("llm"))).toBe("empty");
    expect(classifyFailure(new Error("net::ERR_CONNECTION_REFUSED at https://x.example"))).toBe("navigation");
    expect(classifyFailure(new TypeError("fetch failed"))).toBe("network");
    expect(classifyFailure(new Error("API key not valid"))).toBe("auth");
    expect(classifyFailure(new Error("something odd"))).toBe("service_error");
  });
});

describe("captureDescription", () => {
  it("treats blank output as empty", async () => {
    const service = { name: "llm", generate: vi.fn().mockResolvedValue("   ") };
    const result = await captureDescription(service, "prompt", { timeoutMs: 100 }, silentLog, "a.example");
    expect(result).toEqual({ ok: false, reason: "empty", message: "llm returned no content" });
  });

  it("trims generated text", async () => {
    const service = { name: "llm", generate: vi.fn().mockResolvedValue("  A shop.\n") };
    const result = await captureDescription(service, "prompt", { timeoutMs: 100 }, silentLog, "a.example");
    expect(result).toEqual({ ok: true, value: "A shop.", source: "llm" });
  });
});

describe("withTimeout", () => {
  it("resolves when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve(7), 50, "fast")).resolves.toBe(7);
  });

  it("rejects with a TimeoutError", async () => {
    await expect(withTimeout(new Promise(() => undefined), 10, "slow")).rejects.toThrow(
      "slow timed out after 10ms"
    );
  });
});

describe("runWithConcurrency", () => {
  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;
    const handler = async (n: number) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return n * 2;
    };

    const result = await runWithConcurrency([1, 2, 3, 4, 5], 2, handler);

    expect(result).toEqual({ results: [2, 4, 6, 8, 10], launched: 5, aborted: false });
    expect(peak).toBe(2);
  });

  it("resolves immediately for no items", async () => {
    await expect(runWithConcurrency([], 3, async () => 1)).resolves.toEqual({
      results: [],
      launched: 0,
      aborted: false,
    });
  });

  it("starts nothing when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const handler = vi.fn(async () => 1);

    const result = await runWithConcurrency([1, 2], 2, handler, controller.signal);

    expect(result).toEqual({ results: [undefined, undefined], launched: 0, aborted: true });
    expect(handler).not.toHaveBeenCalled();
  });
});

describe("page context", () => {
  it("reads the title and meta description", () => {
    const html = `<html><head><title> Acme &amp; Co | Shop </title>
      <meta content="Shoes &quot;and&quot; bags" name="description"></head></html>`;
    expect(extractPageContext(html)).toEqual({ title: "Acme & Co | Shop", description: 'Shoes "and" bags' });
  });

  it("falls back to og:description", () => {
    const html = `<meta property="og:description" content='Live shopping'>`;
    expect(extractPageContext(html)).toEqual({ title: "", description: "Live shopping" });
  });

  it("returns null when the page cannot be read", async () => {
    const fetchImpl = vi.fn().mockRejectedValue(new TypeError("fetch failed"));
    await expect(
      fetchPageContext("https://a.example", { timeoutMs: 100, fetchImpl, log: silentLog })
    ).resolves.toBeNull();
  });

  it("returns the parsed context for an ok page", async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response("<title>Acme</title>", { status: 200 }));
    await expect(
      fetchPageContext("https://a.example", { timeoutMs: 100, fetchImpl, log: silentLog })
    ).resolves.toEqual({ title: "Acme", description: "" });
  });
});

describe("screenshotApiUrl", () => {
  it("encodes the target url", () => {
    expect(screenshotApiUrl("test-secret", "https://a.example/?q=1", { width: 800, height: 600 })).toBe(
      "https://shot.screenshotapi.net/screenshot?token=test-secret&url=https%3A%2F%2Fa.example%2F%3Fq%3D1&width=800&height=600&output=image&file_type=png"
    );
  });
});
