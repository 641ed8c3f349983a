import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runExport } from "../collect";
import type { ExportOptions } from "../config";

let dir = "";

function options(overrides: Partial<ExportOptions> = {}): ExportOptions {
  return {
    year: 2024,
    events: null,
    out: path.join(dir, "out", "agents.csv"),
    matchesOut: path.join(dir, "out", "matches.csv"),
    db: path.join(dir, "out", "vct.sqlite"),
    debug: false,
    ...overrides,
  };
}

function stubApi(routes: Record<string, unknown>) {
  vi.stubGlobal(
    "fetch",
    vi.fn(async (u: string | URL | Request) => {
      const url = new URL(String(u));
      if (url.pathname in routes) {
        return new Response(JSON.stringify(routes[url.pathname]));
      }
      throw new Error("unexpected fetch: " + url);
    }),
  );
}

describe("runExport", () => {
  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "vct-collect-"));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("skips the database and still completes when nothing is fetched", async () => {
    stubApi({ "/events": [] });
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const opts = options();

    await expect(runExport(opts)).resolves.toEqual({
      events: 0,
      agentRows: 0,
      matchRows: 0,
      dbWritten: false,
    });

    expect(warn).toHaveBeenCalledWith("Warning: no data fetched; skipping SQLite write.");
    expect(log.mock.calls.map((c) => c[0])).toEqual([
      "Events fetched: 0",
      "Agent rows: 0, Match rows: 0",
      `CSV written: ${opts.out}, ${opts.matchesOut}`,
    ]);
    expect(existsSync(opts.out)).toBe(true);
    expect(existsSync(opts.matchesOut)).toBe(true);
    expect(existsSync(path.join(dir, "out", "vct.sqlite"))).toBe(false);
  });

  it("writes both CSVs and the database and reports them", async () => {
    stubApi({
      "/events": [
        { id: 7, name: "Stage 1", region: "EMEA", start_date: "2024-04-01", end_date: "2024-05-12" },
      ],
      "/events/7/matches": [{ match_id: 70 }],
      "/series/70/matches": [
        {
          map_name: "Ascent",
          teams: [
            { name: "Golf", score: 13, is_winner: true, short: "GLF" },
            { name: "Hotel", score: 11, is_winner: false, short: "HTL" },
          ],
          players: [
            { name: "g1", team_short: "GLF", agents: ["Killjoy"], k: 15, d: 14, a: 6, acs: 205, fk: 2, fd: 1 },
          ],
        },
      ],
    });
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const opts = options();

    await expect(runExport(opts)).resolves.toEqual({
      events: 1,
      agentRows: 1,
      matchRows: 2,
      dbWritten: true,
    });

    expect(log.mock.calls.map((c) => c[0])).toEqual([
      "Events fetched: 1",
      "Agent rows: 1, Match rows: 2",
      `CSV written: ${opts.out}, ${opts.matchesOut}`,
      `SQLite written: ${opts.db}`,
    ]);
    expect(await readFile(opts.out, "utf8")).toBe(
      "event_id,event_name,region,match_id,map,team,player,agent,kills,deaths,assists,acs,fk,fd,rounds_played,result\n" +
        "7,Stage 1,EMEA,70,Ascent,GLF,g1,Killjoy,15,14,6,205,2,1,24,1\n",
    );
    expect(existsSync(path.join(dir, "out", "vct.sqlite"))).toBe(true);
  });

  it("leaves the database alone when no path is given", async () => {
    stubApi({ "/events": [] });
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const summary = await runExport(options({ db: null }));

    expect(summary.dbWritten).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });
});
