import { readFile } from "node:fs/promises";

export type CliArgs = Record<string, string | boolean>;

export type ExportOptions = {
  year: number;
  events: number | null;
  out: string;
  matchesOut: string;
  db: string | null;
  debug: boolean;
};

type FileConfig = Partial<Record<string, unknown>>;

export const DEFAULT_CONFIG_PATH = "vct.config.json";

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined || !a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      out[key] = true;
    } else {
      out[key] = next;
      i++;
    }
  }
  return out;
}

export async function loadConfig(file?: string): Promise<FileConfig> {
  const candidate = file ?? DEFAULT_CONFIG_PATH;
  let raw: string;
  try {
    raw = await readFile(candidate, "utf8");
  } catch {
    // missing file means no file config
    return {};
  }
  const json: unknown = JSON.parse(raw);
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new Error(`Config ${candidate} must be a JSON object`);
  }
  return { ...json };
}

function pick(
  key: string,
  args: CliArgs,
  cfg: FileConfig,
  envName: string,
  env: NodeJS.ProcessEnv,
): string | boolean | undefined {
  const fromArgs = args[key];
  if (fromArgs !== undefined) return fromArgs;
  const fromCfg = cfg[key];
  if (typeof fromCfg === "string" || typeof fromCfg === "boolean") return fromCfg;
  if (typeof fromCfg === "number") return String(fromCfg);
  const fromEnv = env[envName];
  return fromEnv === undefined || fromEnv === "" ? undefined : fromEnv;
}

function toInt(key: string, v: string | boolean | undefined): number | null {
  if (v === undefined) return null;
  if (typeof v === "boolean" || !/^-?\d+$/.test(v.trim())) {
    throw new Error(`--${key} expects an integer, got ${String(v)}`);
  }
  return parseInt(v, 10);
}

function toStr(key: string, v: string | boolean | undefined): string | null {
  if (v === undefined) return null;
  if (typeof v === "boolean") throw new Error(`--${key} expects a path`);
  return v;
}

function toBool(v: string | boolean | undefined): boolean {
  if (v === undefined) return false;
  if (typeof v === "boolean") return v;
  return !["", "0", "false", "no"].includes(v.trim().toLowerCase());
}

// Precedence: CLI flag, then config file, then VCT_* env, then default
export function resolveOptions(
  args: CliArgs,
  cfg: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): ExportOptions {
  return {
    year: toInt("year", pick("year", args, cfg, "VCT_YEAR", env)) ?? 2024,
    events: toInt("events", pick("events", args, cfg, "VCT_EVENTS", env)),
    out:
      toStr("out", pick("out", args, cfg, "VCT_OUT", env)) ??
      "data/vct2024_agent_rounds.csv",
    matchesOut:
      toStr("matches-out", pick("matches-out", args, cfg, "VCT_MATCHES_OUT", env)) ??
      "data/vct2024_matches.csv",
    db: toStr("db", pick("db", args, cfg, "VCT_DB", env)),
    debug: toBool(pick("debug", args, cfg, "VCT_DEBUG", env)),
  };
}
