import {
  extractItems,
  parseEvent,
  parseMapStats,
  parseMatchSummary,
} from "./parsers";
import type {
  EventStatus,
  EventTier,
  MapStats,
  MatchSummary,
  VlrEvent,
} from "./types";

const DEFAULT_BASE = "http://localhost:8000";
const H = { Accept: "application/json" };

export function apiBase(): string {
  return (process.env.VLR_API_BASE || DEFAULT_BASE).replace(/\/+$/, "");
}

// No retry on failure: errors surface with status, url and body
async function j(u: string): Promise<unknown> {
  const r = await fetch(u, { headers: H });
  if (r.ok) return r.json();
  let body = "";
  try {
    body = await r.text();
  } catch {
    body = ""; // keep empty body if text read fails
  }
  throw new Error(`${r.status} ${u}${body ? `\n${body}` : ""}`);
}

export type ListEventsOptions = {
  tier: EventTier;
  status: EventStatus;
  limit?: number | null;
};

// Tier/status listing; limit is passed through to the API, absent = all
export async function listEvents(opts: ListEventsOptions): Promise<VlrEvent[]> {
  const u = new URL(`${apiBase()}/events`);
  u.searchParams.set("tier", opts.tier);
  u.searchParams.set("status", opts.status);
  if (opts.limit) u.searchParams.set("limit", String(opts.limit));
  const items = extractItems(await j(u.toString()));
  return items
    .map(parseEvent)
    .filter((e): e is VlrEvent => e !== null);
}

export async function listEventMatches(
  eventId: number | string,
): Promise<MatchSummary[]> {
  const u = new URL(
    `${apiBase()}/events/${encodeURIComponent(String(eventId))}/matches`,
  );
  const items = extractItems(await j(u.toString()));
  return items
    .map(parseMatchSummary)
    .filter((m): m is MatchSummary => m !== null);
}

// Per-map stats for one series (a match page on VLR)
export async function listSeriesMaps(
  seriesId: number | string,
): Promise<MapStats[]> {
  const u = new URL(
    `${apiBase()}/series/${encodeURIComponent(String(seriesId))}/matches`,
  );
  const items = extractItems(await j(u.toString()));
  return items.map(parseMapStats).filter((m): m is MapStats => m !== null);
}
