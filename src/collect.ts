import type { ExportOptions } from "./config";
import { fetchEventsForYear } from "./events";
import { fetchRowsForEvents } from "./rows";
import { writeCsvs, writeSqlite } from "./writers";

export type ExportSummary = {
  events: number;
  agentRows: number;
  matchRows: number;
  dbWritten: boolean;
};

// select → flatten → write, then print the summary lines
export async function runExport(opts: ExportOptions): Promise<ExportSummary> {
  const evs = await fetchEventsForYear(opts.year, opts.events);
  const { agentRows, matchRows } = await fetchRowsForEvents(evs, {
    debug: opts.debug,
  });

  await writeCsvs(agentRows, matchRows, opts.out, opts.matchesOut);

  const dbWritten = opts.db
    ? await writeSqlite(agentRows, matchRows, opts.db)
    : false;

  console.log(`Events fetched: ${evs.length}`);
  console.log(`Agent rows: ${agentRows.length}, Match rows: ${matchRows.length}`);
  console.log(`CSV written: ${opts.out}, ${opts.matchesOut}`);
  if (dbWritten) console.log(`SQLite written: ${opts.db}`);

  return {
    events: evs.length,
    agentRows: agentRows.length,
    matchRows: matchRows.length,
    dbWritten,
  };
}
