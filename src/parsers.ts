import type {
  MapPlayer,
  MapStats,
  MapTeam,
  MatchSummary,
  VlrEvent,
} from "./types";

type Obj = Record<string, unknown>;

function isObj(v: unknown): v is Obj {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// Bridge responses come either as a bare array or wrapped in items/data
export function extractItems(json: unknown): unknown[] {
  if (Array.isArray(json)) return json;
  if (isObj(json)) {
    if (Array.isArray(json.items)) return json.items;
    if (Array.isArray(json.data)) return json.data;
  }
  return [];
}

function str(v: unknown): string | null {
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return null;
}

function num(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v.replace(/[,%]/g, "").trim());
    return Number.isNaN(n) ? null : n;
  }
  return null;
}

function id(v: unknown): number | string | null {
  if (typeof v === "number" || typeof v === "string") return v;
  return null;
}

// Keeps the calendar date the source reports, ignoring any time or offset
function date(v: unknown): Date | null {
  if (v instanceof Date) {
    if (Number.isNaN(v.getTime())) return null;
    return new Date(Date.UTC(v.getFullYear(), v.getMonth(), v.getDate()));
  }
  if (typeof v !== "string" || !v.trim()) return null;
  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(v.trim());
  if (iso) {
    const [, y, m, d] = iso;
    return new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  }
  const parsed = new Date(v);
  if (Number.isNaN(parsed.getTime())) return null;
  return new Date(
    Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate()),
  );
}

function flag(v: unknown): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v === 1;
  if (typeof v === "string") return ["true", "1"].includes(v.trim().toLowerCase());
  return false;
}

export function parseEvent(raw: unknown): VlrEvent | null {
  if (!isObj(raw)) return null;
  const eventId = id(raw.id ?? raw.event_id);
  if (eventId === null) return null;
  return {
    id: eventId,
    name: str(raw.name),
    region: str(raw.region),
    start_date: date(raw.start_date),
    end_date: date(raw.end_date),
  };
}

export function parseMatchSummary(raw: unknown): MatchSummary | null {
  if (!isObj(raw)) return null;
  const matchId = id(raw.match_id ?? raw.id);
  return matchId === null ? null : { match_id: matchId };
}

// Never drops an entry: the two-team check runs on the raw count
function parseTeam(raw: unknown): MapTeam {
  if (!isObj(raw)) return { name: null, score: null, is_winner: false, short: null };
  return {
    name: str(raw.name),
    score: num(raw.score),
    is_winner: flag(raw.is_winner),
    short: str(raw.short),
  };
}

function parsePlayer(raw: unknown): MapPlayer | null {
  if (!isObj(raw)) return null;
  const agents = Array.isArray(raw.agents)
    ? raw.agents.filter((a): a is string => typeof a === "string")
    : [];
  return {
    name: str(raw.name),
    team_short: str(raw.team_short),
    agents,
    k: num(raw.k),
    d: num(raw.d),
    a: num(raw.a),
    acs: num(raw.acs),
    fk: num(raw.fk),
    fd: num(raw.fd),
  };
}

export function parseMapStats(raw: unknown): MapStats | null {
  if (!isObj(raw)) return null;
  const teams = Array.isArray(raw.teams) ? raw.teams : [];
  const players = Array.isArray(raw.players) ? raw.players : [];
  return {
    map_name: str(raw.map_name),
    teams: teams.map(parseTeam),
    players: players.map(parsePlayer).filter((p): p is MapPlayer => p !== null),
  };
}
