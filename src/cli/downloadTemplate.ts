import fs from "node:fs";
import path from "node:path";
import { loadSettings, requireEnv } from "../config/env";
import { downloadTemplate, SUSPICIOUS_TEMPLATE_BYTES } from "../report/templateSource";
import { getArg } from "./_args";

async function main() {
  const presentationId = getArg("--id") ?? requireEnv("TEMPLATE_SLIDES_ID");
  const outPath = path.resolve(process.cwd(), getArg("--out") ?? loadSettings().templatePath);

  console.log(`[template] downloading presentation ${presentationId}`);
  const data = await downloadTemplate({ presentationId });
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, data);

  const sizeMb = (data.length / (1024 * 1024)).toFixed(2);
  console.log(`Wrote ${outPath} (${sizeMb} MB)`);
  if (data.length < SUSPICIOUS_TEMPLATE_BYTES) {
    console.log("If the template looks wrong, re-share it as \"anyone with the link can view\" and retry.");
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
