import { loadSettings } from "../config/env";
import { listFilterOptions } from "../filter/filterRows";
import { referenceLoaderFromEnv } from "../reference/referenceFromEnv";

async function main() {
  const table = await referenceLoaderFromEnv(loadSettings())();
  const options = listFilterOptions(table);

  console.log(`Reference rows: ${table.rowCount}, business ids: ${table.records.size}`);
  if (table.duplicateIds.length) {
    console.log(`Duplicate business ids: ${table.duplicateIds.slice(0, 10).join(", ")}`);
  }
  console.log(`\nIndustries (${options.industries.length}):`);
  for (const industry of options.industries) console.log(`  ${industry}`);
  console.log(`\nCountries (${options.countries.length}):`);
  for (const country of options.countries) console.log(`  ${country}`);
  console.log(`\nRegions: ${options.regions.join(", ")}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
