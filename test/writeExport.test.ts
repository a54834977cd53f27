import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { GROUP_EXPORT_COLUMNS, ROW_EXPORT_COLUMNS } from "../src/export/exportColumns";
import { parseExport, serializeExport, toExportRecords, writeExportFile } from "../src/export/writeExport";
import { groupByDomain } from "../src/aggregate/aggregateByDomain";
import { joinedRow } from "./utils/rows";

const rows = [
  joinedRow({
    business_id: "00123",
    channel_id: "0042",
    page_url: "https://a.example/1",
    metrics: { VIDEO_VIEWS: 1234, VIEWTHROUGH_RATE: 0.125 },
  }),
  joinedRow({
    business_id: "B2",
    account_name: "",
    page_url: "https://b.example/live",
    case_type: "LIVE_STREAM",
    metrics: { THUMBNAIL_IMPRESSIONS: 77, A2C_RATE: 0.0375 },
  }),
];

describe("export round trip", () => {
  it("reproduces every row field through csv", () => {
    const data = serializeExport(rows, ROW_EXPORT_COLUMNS, "csv");
    const parsed = parseExport(data, ROW_EXPORT_COLUMNS, "csv");

    expect(parsed).toEqual(toExportRecords(rows, ROW_EXPORT_COLUMNS));
    expect(parsed[0].business_id).toBe("00123");
    expect(parsed[0].A2C_RATE).toBeNull();
  });

  it("reproduces every row field through xlsx", () => {
    const data = serializeExport(rows, ROW_EXPORT_COLUMNS, "xlsx");
    const parsed = parseExport(data, ROW_EXPORT_COLUMNS, "xlsx");

    expect(parsed).toEqual(toExportRecords(rows, ROW_EXPORT_COLUMNS));
  });

  it("writes grouped output with its own columns", () => {
    const groups = groupByDomain(rows);
    const filePath = path.resolve(__dirname, "tmp", `groups-${Date.now()}.csv`);

    writeExportFile({ filePath, items: groups, columns: GROUP_EXPORT_COLUMNS });

    const text = fs.readFileSync(filePath, "utf8");
    expect(text.split("\n")[0]).toBe(
      "Domain,Case Type,Account Name,Business Name,Industry,Territory,Sample Count,Video Views,Thumbnail Impressions,Viewthrough Rate,Clickthrough Rate,A2C Rate"
    );
    expect(parseExport(fs.readFileSync(filePath), GROUP_EXPORT_COLUMNS, "csv")).toEqual(
      toExportRecords(groups, GROUP_EXPORT_COLUMNS)
    );
  });

  it("rejects a file with different columns", () => {
    const data = serializeExport(rows, ROW_EXPORT_COLUMNS, "csv");
    expect(() => parseExport(data, GROUP_EXPORT_COLUMNS, "csv")).toThrow("Export columns do not match");
  });
});
