import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";

export type FixtureCell = string | number | boolean | null;

export const PERFORMANCE_HEADER = [
  "Page Url",
  "Business Id",
  "Business Name",
  "Business Country",
  "Channel Id",
  "Channel Name",
  "Video Views",
  "Thumbnail Impressions",
  "Viewthrough Rate",
  "Clickthrough Rate",
  "A2C Rate",
];

function ensureDir(filePath: string) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function xlsxBuffer(rows: FixtureCell[][], sheetName = "Export"): Buffer {
  const worksheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);
  const out: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return out;
}

export function makeXlsx(filePath: string, rows: FixtureCell[][] = []): void {
  const allRows = rows.length ? rows : [PERFORMANCE_HEADER];
  ensureDir(filePath);
  fs.writeFileSync(filePath, xlsxBuffer(allRows));
}

function csvCell(value: FixtureCell): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvText(rows: FixtureCell[][]): string {
  return rows.map((row) => row.map(csvCell).join(",")).join("\n") + "\n";
}

export function makeCsv(filePath: string, rows: FixtureCell[][]): void {
  ensureDir(filePath);
  fs.writeFileSync(filePath, csvText(rows), "utf8");
}
