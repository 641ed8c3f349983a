import { listEvents } from "./vlr-client";
import type { VlrEvent } from "./types";

export function filterEventsForYear(evs: VlrEvent[], year: number): VlrEvent[] {
  const filtered = evs.filter((ev) => {
    const sd = ev.start_date;
    const ed = ev.end_date;
    if (sd && sd.getUTCFullYear() === year) return true;
    if (ed && ed.getUTCFullYear() === year) return true;
    // Undated events are kept rather than dropped
    return sd === null && ed === null;
  });
  // Nothing matched: better to fetch something than nothing
  return filtered.length > 0 ? filtered : evs;
}

export async function fetchEventsForYear(
  year: number,
  limitEvents?: number | null,
): Promise<VlrEvent[]> {
  const evs = await listEvents({
    tier: "vct",
    status: "all",
    limit: limitEvents || null,
  });
  return filterEventsForYear(evs, year);
}
