import type { RiverLog } from "./royale";
import { normalizeTag } from "./tag";

export type PlayerAggregate = {
  name: string;
  fame: number;
  repairPoints: number;
  decksUsed: number;
  boatAttacks: number;
  wars: number;
  firstSeen: Date | null;
  lastSeen: Date | null;
};

export const NAMELESS_KEY_PREFIX = "NON-";

/**
 * Accumulator key of a participant. Without a tag the name is used, so two
 * tagless players sharing a name end up in one entry.
 */
export function aggregateKey(tag: string, name: string): string {
  const normalized = normalizeTag(tag);
  return normalized || `${NAMELESS_KEY_PREFIX}${name || "?"}`;
}

/** Fold the river race log into per-player totals of the clan `ownTag`. */
export function aggregateWarHistory(log: RiverLog, ownTag: string): Map<string, PlayerAggregate> {
  const ownClanTag = normalizeTag(ownTag);
  const acc = new Map<string, PlayerAggregate>();

  for (const entry of log.items) {
    const at = entry.createdAt;
    const standing = entry.standings.find((s) => normalizeTag(s.clan.tag) === ownClanTag);
    if (!standing) continue;

    for (const p of standing.clan.participants) {
      const key = aggregateKey(p.tag, p.name);
      const agg = acc.get(key) ?? {
        name: p.name || "Unknown",
        fame: 0,
        repairPoints: 0,
        decksUsed: 0,
        boatAttacks: 0,
        wars: 0,
        firstSeen: null,
        lastSeen: null,
      };

      // latest name wins, but an empty one never replaces a known name
      if (p.name) agg.name = p.name;
      agg.fame += p.fame;
      agg.repairPoints += p.repairPoints;
      agg.decksUsed += p.decksUsed;
      agg.boatAttacks += p.boatAttacks;
      agg.wars += 1;
      if (at) {
        if (!agg.firstSeen || at < agg.firstSeen) agg.firstSeen = at;
        if (!agg.lastSeen || at > agg.lastSeen) agg.lastSeen = at;
      }
      acc.set(key, agg);
    }
  }

  return acc;
}

export type HistoryMatch = { key: string; aggregate: PlayerAggregate };

/** Exact name matches first, then name substrings, then the tag. */
export function findHistoryMatches(
  history: Map<string, PlayerAggregate>,
  query: string
): HistoryMatch[] {
  const q = query.trim().toLowerCase();
  if (!q) return [];
  const entries = [...history.entries()].map(([key, aggregate]) => ({ key, aggregate }));

  const exact = entries.filter((e) => e.aggregate.name.toLowerCase() === q);
  if (exact.length > 0) return exact;
  const partial = entries.filter((e) => e.aggregate.name.toLowerCase().includes(q));
  if (partial.length > 0) return partial;
  const tag = normalizeTag(q);
  return entries.filter((e) => e.key === tag);
}
