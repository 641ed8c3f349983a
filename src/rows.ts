import { listEventMatches, listSeriesMaps } from "./vlr-client";
import type {
  AgentRoundRow,
  MapStats,
  MatchRow,
  VlrEvent,
} from "./types";

export type MapContext = {
  event_id: number | string;
  event_name: string | null;
  region: string | null;
  match_id: number | string;
};

export type FlatRows = {
  agentRows: AgentRoundRow[];
  matchRows: MatchRow[];
};

/**
 * Flattens one map into two match rows (one per side) and one agent row per
 * roster entry. Maps without exactly two teams yield nothing.
 */
export function flattenMap(ctx: MapContext, mp: MapStats): FlatRows {
  const agentRows: AgentRoundRow[] = [];
  const matchRows: MatchRow[] = [];
  if (mp.teams.length !== 2) return { agentRows, matchRows };
  const [t1, t2] = mp.teams;
  if (!t1 || !t2) return { agentRows, matchRows };

  const roundsPlayed = (t1.score ?? 0) + (t2.score ?? 0);

  for (const [team, opp] of [
    [t1, t2],
    [t2, t1],
  ] as const) {
    matchRows.push({
      event_id: ctx.event_id,
      event_name: ctx.event_name,
      region: ctx.region,
      match_id: ctx.match_id,
      map: mp.map_name,
      team: team.name,
      opponent: opp.name,
      rounds_played: roundsPlayed,
      result: team.is_winner ? 1 : 0,
      start_time: null, // not exposed by the API
    });
  }

  for (const p of mp.players) {
    const won =
      (t1.is_winner && p.team_short === t1.short) ||
      (t2.is_winner && p.team_short === t2.short);
    agentRows.push({
      event_id: ctx.event_id,
      event_name: ctx.event_name,
      region: ctx.region,
      match_id: ctx.match_id,
      map: mp.map_name,
      team: p.team_short,
      player: p.name,
      agent: p.agents[0] ?? null,
      kills: p.k,
      deaths: p.d,
      assists: p.a,
      acs: p.acs,
      fk: p.fk,
      fd: p.fd,
      rounds_played: roundsPlayed,
      result: won ? 1 : 0,
    });
  }

  return { agentRows, matchRows };
}

export async function fetchRowsForEvents(
  evs: VlrEvent[],
  opts: { debug?: boolean } = {},
): Promise<FlatRows> {
  const agentRows: AgentRoundRow[] = [];
  const matchRows: MatchRow[] = [];

  for (const ev of evs) {
    const evMatches = await listEventMatches(ev.id);
    if (opts.debug) {
      console.error(`DEBUG event ${ev.id} (${ev.name}): ${evMatches.length} matches`);
    }
    for (const m of evMatches) {
      const maps = await listSeriesMaps(m.match_id);
      for (const mp of maps) {
        const out = flattenMap(
          {
            event_id: ev.id,
            event_name: ev.name,
            region: ev.region,
            match_id: m.match_id,
          },
          mp,
        );
        matchRows.push(...out.matchRows);
        agentRows.push(...out.agentRows);
      }
    }
  }

  return { agentRows, matchRows };
}
