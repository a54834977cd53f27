import path from "node:path";
import { describe, it, expect } from "vitest";
import { normalizeExports, parsePerformanceExport } from "../src/ingest/parsePerformanceExport";
import { ExportsRejectedError, InvalidRowError, MissingColumnError, UploadRejectedError } from "../src/lib/errors";
import { makeCsv, makeXlsx, PERFORMANCE_HEADER, xlsxBuffer } from "./utils/makeXlsx";

const tmpDir = path.resolve(__dirname, "tmp");

function tmpFile(name: string) {
  return path.join(tmpDir, `${name}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
}

describe("parsePerformanceExport", () => {
  it("parses metrics, skips blank rows and reports invalid rows", () => {
    const filePath = `${tmpFile("short-video")}.xlsx`;
    makeXlsx(filePath, [
      PERFORMANCE_HEADER,
      ["https://shop-a.example/p/1", "B1", "Shop A", "Japan", "C1", "Channel A", 1000, 5000, 0.25, "12.5%", null],
      [],
      ["https://shop-b.example/", "", "Shop B", "Japan", "C2", "Channel B", 10, 20, 0.1, 0.2, 0.3],
      ["", "", "Shop C", "Japan", "C3", "Channel C", 10, 20, 0.1, 0.2, 0.3],
    ]);

    const result = parsePerformanceExport(filePath, "SHORT_VIDEO");

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]).toEqual({
      case_type: "SHORT_VIDEO",
      page_url: "https://shop-a.example/p/1",
      business_id: "B1",
      business_name: "Shop A",
      business_country: "Japan",
      channel_id: "C1",
      channel_name: "Channel A",
      metrics: {
        VIDEO_VIEWS: 1000,
        THUMBNAIL_IMPRESSIONS: 5000,
        VIEWTHROUGH_RATE: 0.25,
        CLICKTHROUGH_RATE: 0.125,
      },
    });

    expect(result.rejected).toHaveLength(2);
    expect(result.rejected[0]).toBeInstanceOf(InvalidRowError);
    expect(result.rejected[0].rowNumber).toBe(4);
    expect(result.rejected[0].reasons).toEqual(["missing_business_id"]);
    expect(result.rejected[1].rowNumber).toBe(5);
    expect(result.rejected[1].reasons).toEqual(["missing_business_id", "missing_page_url"]);
  });

  it("rejects an export missing a required column", () => {
    const header = PERFORMANCE_HEADER.filter((column) => column !== "Video Views");
    const data = xlsxBuffer([header]);

    try {
      parsePerformanceExport({ fileName: "short.xlsx", data }, "SHORT_VIDEO");
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(MissingColumnError);
      if (err instanceof MissingColumnError) {
        expect(err.missingColumns).toEqual(["Video Views"]);
        expect(err.source).toBe("Short video");
      }
    }
  });

  it("accepts an export without the optional metric columns", () => {
    const header = PERFORMANCE_HEADER.slice(0, 7);
    const data = xlsxBuffer([header, ["https://a.example/", "B1", "A", "Japan", "C1", "Chan", 42]]);

    const result = parsePerformanceExport({ fileName: "live.xlsx", data }, "LIVE_STREAM");

    expect(result.rows[0].metrics).toEqual({ VIDEO_VIEWS: 42 });
    expect(result.rows[0].case_type).toBe("LIVE_STREAM");
  });

  it("keeps csv ids as text and reads formatted numbers", () => {
    const filePath = `${tmpFile("live")}.csv`;
    makeCsv(filePath, [
      PERFORMANCE_HEADER,
      ["https://a.example/live", "00123", "Shop A", "Japan", "007", "Channel A", "1,234", "", "0.3", "45%", ""],
    ]);

    const result = parsePerformanceExport(filePath, "LIVE_STREAM");

    expect(result.rows[0].business_id).toBe("00123");
    expect(result.rows[0].channel_id).toBe("007");
    expect(result.rows[0].metrics).toEqual({
      VIDEO_VIEWS: 1234,
      VIEWTHROUGH_RATE: 0.3,
      CLICKTHROUGH_RATE: 0.45,
    });
  });

  it("rejects unsupported and oversized uploads", () => {
    expect(() =>
      parsePerformanceExport({ fileName: "export.pdf", data: Buffer.from("x") }, "SHORT_VIDEO")
    ).toThrow(UploadRejectedError);
    expect(() =>
      parsePerformanceExport(
        { fileName: "export.csv", data: Buffer.from("0123456789A") },
        "SHORT_VIDEO",
        { maxBytes: 10 }
      )
    ).toThrow("the upload limit is 10 bytes");
  });
});

describe("normalizeExports", () => {
  it("tags each source with its case type and counts skipped rows", () => {
    const shortVideo = xlsxBuffer([
      PERFORMANCE_HEADER,
      ["https://a.example/1", "B1", "A", "Japan", "C1", "Chan", 10, 100, 0.1, 0.01, 0.001],
      ["", "B2", "B", "Japan", "C2", "Chan", 10, 100, 0.1, 0.01, 0.001],
    ]);
    const liveStream = xlsxBuffer([
      PERFORMANCE_HEADER,
      ["https://b.example/live", "B3", "B", "Japan", "C3", "Chan", 20, 200, 0.2, 0.02, 0.002],
    ]);

    const normalized = normalizeExports(
      { fileName: "sv.xlsx", data: shortVideo },
      { fileName: "ls.xlsx", data: liveStream }
    );

    expect(normalized.shortVideo.map((row) => row.case_type)).toEqual(["SHORT_VIDEO"]);
    expect(normalized.liveStream.map((row) => row.case_type)).toEqual(["LIVE_STREAM"]);
    expect(normalized.skippedCount).toBe(1);
    expect(normalized.rejected[0].source).toBe("Short video");
  });

  it("reports both exports when both are missing columns", () => {
    const broken = xlsxBuffer([["Page Url"]]);

    try {
      normalizeExports({ fileName: "sv.xlsx", data: broken }, { fileName: "ls.xlsx", data: broken });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ExportsRejectedError);
      if (err instanceof ExportsRejectedError) {
        expect(err.code).toBe("missing_columns");
        expect(err.errors.map((e) => e.source)).toEqual(["Short video", "Live stream"]);
        expect(err.message).toMatch(/^Short video export is missing required columns: .*; Live stream export/);
      }
    }
  });

  it("throws the single MissingColumnError when only the live stream export is broken", () => {
    const good = xlsxBuffer([PERFORMANCE_HEADER, ["https://a.example/1", "B1", "A", "Japan", "C1", "Chan", 10]]);
    const broken = xlsxBuffer([PERFORMANCE_HEADER.filter((column) => column !== "Business Id")]);

    try {
      normalizeExports({ fileName: "sv.xlsx", data: good }, { fileName: "ls.xlsx", data: broken });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(MissingColumnError);
      if (err instanceof MissingColumnError) {
        expect(err.source).toBe("Live stream");
        expect(err.missingColumns).toEqual(["Business Id"]);
      }
    }
  });
});
