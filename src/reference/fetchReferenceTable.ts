import type { DuplicatePolicy } from "../config/env";
import { getErrorMessage, ReferenceUnavailableError } from "../lib/errors";
import { formatRetryError, isTransientHttpError, retryAsync } from "../lib/retry";
import { parseReferenceCsv } from "./parseReferenceTable";
import type { ReferenceTable } from "./parseReferenceTable";

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type ReferenceSource = {
  sheetId: string;
  gid?: string;
  duplicatePolicy?: DuplicatePolicy;
  timeoutMs?: number;
  retries?: number;
  retryDelaysMs?: number[];
  fetchImpl?: FetchLike;
};

export function referenceCsvUrl(sheetId: string, gid = "0"): string {
  return `https://docs.google.com/spreadsheets/d/${encodeURIComponent(sheetId)}/export?format=csv&gid=${encodeURIComponent(gid)}`;
}

function classifyStatus(status: number): ReferenceUnavailableError {
  if (status === 404) {
    return new ReferenceUnavailableError(
      "not_found",
      "Reference sheet not found (404). Check REFERENCE_SHEET_ID.",
      status
    );
  }
  if (status === 401 || status === 403) {
    return new ReferenceUnavailableError(
      "access_denied",
      `Reference sheet access denied (${status}). Share the sheet as "anyone with the link can view".`,
      status
    );
  }
  return new ReferenceUnavailableError(
    "http_error",
    `Reference sheet request failed with status ${status}.`,
    status
  );
}

async function fetchReferenceCsvOnce(url: string, fetchImpl: FetchLike, timeoutMs: number): Promise<string> {
  let response: Response;
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw new ReferenceUnavailableError(
      "network",
      `Reference sheet request failed: ${getErrorMessage(err)}`
    );
  }

  if (!response.ok) throw classifyStatus(response.status);

  // A private sheet answers 200 with the sign-in page instead of CSV.
  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.includes("text/html")) {
    throw new ReferenceUnavailableError(
      "access_denied",
      'Reference sheet returned an HTML page instead of CSV. Share the sheet as "anyone with the link can view".',
      response.status
    );
  }

  try {
    return await response.text();
  } catch (err) {
    throw new ReferenceUnavailableError(
      "network",
      `Reference sheet download was interrupted: ${getErrorMessage(err)}`,
      response.status
    );
  }
}

function isRetryable(err: unknown): boolean {
  if (!(err instanceof ReferenceUnavailableError)) return false;
  return err.reason === "network" || isTransientHttpError(err);
}

export async function fetchReferenceCsv(source: ReferenceSource): Promise<string> {
  const url = referenceCsvUrl(source.sheetId, source.gid);
  const fetchImpl = source.fetchImpl ?? fetch;
  const timeoutMs = source.timeoutMs ?? 10_000;

  return retryAsync(() => fetchReferenceCsvOnce(url, fetchImpl, timeoutMs), {
    retries: source.retries ?? 2,
    delaysMs: source.retryDelaysMs ?? [500, 1500],
    shouldRetry: isRetryable,
    onRetry: ({ attempt, error, delayMs }) => {
      console.warn(
        `[reference] retry ${attempt} in ${delayMs}ms after ${formatRetryError(error)}`
      );
    },
  });
}

export async function loadReferenceTable(source: ReferenceSource): Promise<ReferenceTable> {
  const csv = await fetchReferenceCsv(source);
  const table = parseReferenceCsv(csv, source.duplicatePolicy);
  if (table.duplicateIds.length) {
    console.warn(
      `[reference] ${table.duplicateIds.length} duplicate business id(s), policy=${source.duplicatePolicy ?? "last_write_wins"}`
    );
  }
  return table;
}
