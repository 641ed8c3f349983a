export type EventTier = "vct" | "vcl" | "t3" | "gc" | "cg" | "offseason" | "all";
export type EventStatus = "all" | "upcoming" | "ongoing" | "completed";

export type VlrEvent = {
  id: number | string;
  name: string | null;
  region: string | null;
  start_date: Date | null;
  end_date: Date | null;
};

export type MatchSummary = {
  match_id: number | string;
};

export type MapTeam = {
  name: string | null;
  score: number | null;
  is_winner: boolean;
  short: string | null;
};

export type MapPlayer = {
  name: string | null;
  team_short: string | null;
  agents: string[];
  k: number | null;
  d: number | null;
  a: number | null;
  acs: number | null;
  fk: number | null;
  fd: number | null;
};

export type MapStats = {
  map_name: string | null;
  teams: MapTeam[];
  players: MapPlayer[];
};

export const AGENT_ROUND_COLUMNS = [
  "event_id",
  "event_name",
  "region",
  "match_id",
  "map",
  "team",
  "player",
  "agent",
  "kills",
  "deaths",
  "assists",
  "acs",
  "fk",
  "fd",
  "rounds_played",
  "result",
] as const;

export const MATCH_COLUMNS = [
  "event_id",
  "event_name",
  "region",
  "match_id",
  "map",
  "team",
  "opponent",
  "rounds_played",
  "result",
  "start_time",
] as const;

// One row per player per map.
export type AgentRoundRow = {
  event_id: number | string;
  event_name: string | null;
  region: string | null;
  match_id: number | string;
  map: string | null;
  team: string | null;
  player: string | null;
  agent: string | null;
  kills: number | null;
  deaths: number | null;
  assists: number | null;
  acs: number | null;
  fk: number | null;
  fd: number | null;
  rounds_played: number;
  result: 0 | 1;
};

// One row per team per map (two per map).
export type MatchRow = {
  event_id: number | string;
  event_name: string | null;
  region: string | null;
  match_id: number | string;
  map: string | null;
  team: string | null;
  opponent: string | null;
  rounds_played: number;
  result: 0 | 1;
  start_time: string | null;
};
