import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, parseArgs, resolveOptions } from "../config";

describe("parseArgs", () => {
  it("reads --key value pairs and bare flags", () => {
    expect(
      parseArgs(["--year", "2023", "--debug", "--db", "data/x.sqlite", "stray"]),
    ).toEqual({ year: "2023", debug: true, db: "data/x.sqlite" });
  });
});

describe("resolveOptions", () => {
  it("falls back to defaults", () => {
    expect(resolveOptions({}, {}, {})).toEqual({
      year: 2024,
      events: null,
      out: "data/vct2024_agent_rounds.csv",
      matchesOut: "data/vct2024_matches.csv",
      db: null,
      debug: false,
    });
  });

  it("prefers flags over config file over environment", () => {
    const opts = resolveOptions(
      { year: "2022" },
      { year: 2023, events: 5, "matches-out": "cfg/matches.csv" },
      { VCT_YEAR: "2021", VCT_EVENTS: "9", VCT_DB: "env.sqlite", VCT_DEBUG: "1" },
    );
    expect(opts).toEqual({
      year: 2022,
      events: 5,
      out: "data/vct2024_agent_rounds.csv",
      matchesOut: "cfg/matches.csv",
      db: "env.sqlite",
      debug: true,
    });
  });

  it("rejects a non-integer year", () => {
    expect(() => resolveOptions({ year: "twenty" }, {}, {})).toThrow(
      "--year expects an integer, got twenty",
    );
  });

  it("rejects a path flag given without a value", () => {
    expect(() => resolveOptions({ db: true }, {}, {})).toThrow("--db expects a path");
  });
});

describe("loadConfig", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("returns an empty config when the file is missing", async () => {
    await expect(loadConfig(path.join(os.tmpdir(), "no-such-vct.json"))).resolves.toEqual({});
  });

  it("reads a JSON object", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "vct-config-"));
    const file = path.join(dir, "vct.config.json");
    await writeFile(file, JSON.stringify({ year: 2025, db: "x.sqlite" }));
    await expect(loadConfig(file)).resolves.toEqual({ year: 2025, db: "x.sqlite" });
  });

  it("rejects a config that is not an object", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "vct-config-"));
    const file = path.join(dir, "vct.config.json");
    await writeFile(file, "[1, 2]");
    await expect(loadConfig(file)).rejects.toThrow("must be a JSON object");
  });
});
