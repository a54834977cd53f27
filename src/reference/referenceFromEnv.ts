import type { AppSettings } from "../config/env";
import { optionalEnv } from "../config/env";
import { ReferenceUnavailableError } from "../lib/errors";
import { loadReferenceTable } from "./fetchReferenceTable";
import type { ReferenceTable } from "./parseReferenceTable";

export function referenceLoaderFromEnv(settings: AppSettings): () => Promise<ReferenceTable> {
  return () => {
    const sheetId = optionalEnv("REFERENCE_SHEET_ID");
    if (!sheetId) {
      return Promise.reject(
        new ReferenceUnavailableError("not_configured", "Missing REFERENCE_SHEET_ID. Put it in .env.local")
      );
    }
    return loadReferenceTable({
      sheetId,
      gid: settings.referenceSheetGid,
      duplicatePolicy: settings.referenceDuplicatePolicy,
    });
  };
}
