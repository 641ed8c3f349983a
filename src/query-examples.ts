import "dotenv/config";
import { loadConfig, parseArgs } from "./config";
import { loadExampleQueries, runQueries } from "./queries";

(async () => {
  const args = parseArgs(process.argv.slice(2));
  const fileCfg = await loadConfig(
    typeof args.config === "string" ? args.config : undefined,
  );
  const cfgDb = typeof fileCfg.db === "string" ? fileCfg.db : undefined;
  const dbPath =
    (typeof args.db === "string" ? args.db : undefined) ??
    cfgDb ??
    process.env.VCT_DB;
  if (!dbPath) {
    throw new Error("Provide --db <path> (or db in config / VCT_DB)");
  }

  for (const res of await runQueries(dbPath, await loadExampleQueries())) {
    console.log(`\n=== ${res.title} ===`);
    if (res.rows.length === 0) console.log("(no rows)");
    else console.table(res.rows);
  }
})().catch((e) => {
  console.error(e);
  process.exit(1);
});
