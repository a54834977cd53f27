import path from "node:path";
import { loadSettings } from "../config/env";
import { GROUP_EXPORT_COLUMNS, ROW_EXPORT_COLUMNS } from "../export/exportColumns";
import { writeExportFile } from "../export/writeExport";
import { referenceLoaderFromEnv } from "../reference/referenceFromEnv";
import { AnalysisSession } from "../session/analysisSession";
import { ANALYSIS_FLAGS, getArg, readAnalysisRequest } from "./_args";

function usage() {
  console.log(`Usage: npm run analyze -- ${ANALYSIS_FLAGS} [--out out/cases.csv]`);
}

async function main() {
  const shortVideo = getArg("--short-video");
  const liveStream = getArg("--live-stream");
  if (!shortVideo || !liveStream) {
    usage();
    process.exit(1);
  }

  const settings = loadSettings();
  const session = new AnalysisSession(referenceLoaderFromEnv(settings), {
    maxBytes: settings.maxUploadBytes,
  });

  const upload = session.loadUpload(shortVideo, liveStream);
  console.log(
    `[analyze] short video rows: ${upload.shortVideo.length}, live stream rows: ${upload.liveStream.length}, skipped: ${upload.skippedCount}`
  );
  for (const rejected of upload.rejected.slice(0, 10)) {
    console.warn(`[analyze] ${rejected.message}`);
  }

  const result = await session.analyze(readAnalysisRequest());
  const { stats } = result;
  console.log(
    `[analyze] input=${stats.inputRows} matched=${stats.matchedReference} filtered=${stats.filteredRows}`
  );

  const outPath = path.resolve(process.cwd(), getArg("--out") ?? path.join("out", "cases.csv"));
  if (result.grouped) {
    writeExportFile({ filePath: outPath, items: result.groups, columns: GROUP_EXPORT_COLUMNS });
    console.log(`[analyze] ${result.groups.length} domain group(s)`);
  } else {
    writeExportFile({ filePath: outPath, items: result.rows, columns: ROW_EXPORT_COLUMNS });
    console.log(`[analyze] ${result.rows.length} row(s)`);
  }
  console.log(`Wrote ${outPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
