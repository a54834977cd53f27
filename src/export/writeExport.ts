import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { cellText, isBlankRow, readFirstSheetMatrix, readWorkbook } from "../ingest/sheetUtils";
import type { SheetCell } from "../ingest/sheetUtils";
import { toExportRecord } from "./exportColumns";
import type { ColumnKind, ExportColumn, ExportRecord, ExportValue } from "./exportColumns";

export type ExportFormat = "csv" | "xlsx";

export const EXPORT_SHEET_NAME = "Cases";

function buildSheet<T>(items: readonly T[], columns: readonly ExportColumn<T>[]): XLSX.WorkSheet {
  const header = columns.map((column) => column.header);
  const body = items.map((item) => columns.map((column) => column.get(item)));
  return XLSX.utils.aoa_to_sheet([header, ...body]);
}

export function serializeExport<T>(
  items: readonly T[],
  columns: readonly ExportColumn<T>[],
  format: ExportFormat
): Buffer {
  const sheet = buildSheet(items, columns);
  if (format === "csv") {
    const csv = XLSX.utils.sheet_to_csv(sheet, { rawNumbers: true, blankrows: false });
    return Buffer.from(csv, "utf8");
  }
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, EXPORT_SHEET_NAME);
  const out: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return out;
}

export function writeExportFile<T>(params: {
  filePath: string;
  items: readonly T[];
  columns: readonly ExportColumn<T>[];
  format?: ExportFormat;
}): string {
  const { filePath, items, columns } = params;
  const format = params.format ?? (path.extname(filePath).toLowerCase() === ".csv" ? "csv" : "xlsx");
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, serializeExport(items, columns, format));
  return filePath;
}

function decodeCell(value: SheetCell | undefined, kind: ColumnKind): ExportValue {
  if (kind === "text") return cellText(value);
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return value;
  const raw = cellText(value);
  if (!raw) return null;
  const num = Number(raw);
  return Number.isFinite(num) ? num : null;
}

export function parseExport<T>(
  data: Buffer,
  columns: readonly ExportColumn<T>[],
  format: ExportFormat
): ExportRecord[] {
  const workbook =
    format === "csv" ? readWorkbook(data.toString("utf8"), "string") : readWorkbook(data, "buffer");
  const matrix = readFirstSheetMatrix(workbook);
  const headers = (matrix[0] ?? []).map((value) => cellText(value));

  const expected = columns.map((column) => column.header);
  if (headers.join("\u0000") !== expected.join("\u0000")) {
    throw new Error(`Export columns do not match: got [${headers.join(", ")}]`);
  }

  const records: ExportRecord[] = [];
  for (let i = 1; i < matrix.length; i += 1) {
    const row = matrix[i] ?? [];
    if (isBlankRow(row)) continue;
    const record: ExportRecord = {};
    columns.forEach((column, idx) => {
      record[column.key] = decodeCell(row[idx], column.kind);
    });
    records.push(record);
  }
  return records;
}

export function toExportRecords<T>(items: readonly T[], columns: readonly ExportColumn<T>[]) {
  return items.map((item) => toExportRecord(item, columns));
}
