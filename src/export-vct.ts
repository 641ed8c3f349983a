import "dotenv/config";
import { runExport } from "./collect";
import { loadConfig, parseArgs, resolveOptions } from "./config";
import { apiBase } from "./vlr-client";

(async () => {
  const args = parseArgs(process.argv.slice(2));
  const fileCfg = await loadConfig(
    typeof args.config === "string" ? args.config : undefined,
  );
  const opts = resolveOptions(args, fileCfg);

  if (opts.debug) {
    console.error("DEBUG options:", JSON.stringify({ ...opts, api: apiBase() }));
  }

  await runExport(opts);
})().catch((e) => {
  console.error(e);
  process.exit(1);
});
