import * as XLSX from "xlsx";

export type SheetCell = string | number | boolean | Date | null;

export function ensureWorksheetRef(ws: XLSX.WorkSheet) {
  const ref = ws["!ref"];
  if (!ref || ref === "A1") {
    let maxR = 0;
    let maxC = 0;

    for (const key of Object.keys(ws)) {
      if (key[0] === "!") continue;
      const addr = XLSX.utils.decode_cell(key);
      if (addr.r > maxR) maxR = addr.r;
      if (addr.c > maxC) maxC = addr.c;
    }

    ws["!ref"] = XLSX.utils.encode_range({ s: { r: 0, c: 0 }, e: { r: maxR, c: maxC } });
  }
}

export function normalizeHeader(value: string): string {
  const trimmed = value.replace(/^\uFEFF/, "");
  return trimmed
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  }
  return String(value).trim();
}

export function parseCount(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const raw = String(value).trim();
  if (!raw) return null;
  const cleaned = raw.replace(/,/g, "");
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
}

// A numeric cell is already a fraction; a "12.5%" string is a percentage.
export function parseRate(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const raw = String(value).trim();
  if (!raw) return null;
  const isPercent = raw.endsWith("%");
  const cleaned = raw.replace(/[% ,]/g, "");
  if (!cleaned) return null;
  const num = Number(cleaned);
  if (!Number.isFinite(num)) return null;
  return isPercent ? num / 100 : num;
}

export function readWorkbook(data: Buffer | Uint8Array | string, type: "buffer" | "string") {
  return XLSX.read(data, { type, cellDates: true, raw: true });
}

export function readFirstSheetMatrix(workbook: XLSX.WorkBook): SheetCell[][] {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return [];

  ensureWorksheetRef(sheet);

  return XLSX.utils.sheet_to_json<SheetCell[]>(sheet, {
    header: 1,
    raw: true,
    blankrows: true,
    defval: null,
  });
}

export function mapHeaders(
  headers: string[],
  aliases: Record<string, string[]>
): Record<string, number> {
  const normalized = headers.map((h) => normalizeHeader(h));
  const indexMap: Record<string, number> = {};
  for (const [field, candidates] of Object.entries(aliases)) {
    for (let i = 0; i < normalized.length; i += 1) {
      if (candidates.includes(normalized[i])) {
        indexMap[field] = i;
        break;
      }
    }
  }
  return indexMap;
}

export function isBlankRow(row: readonly SheetCell[]): boolean {
  return row.every((cell) => cellText(cell) === "");
}
