import type { CurrentRiverRace, RiverClan, RiverLog } from "./royale";
import { normalizeTag } from "./tag";

export type OpponentCandidate = {
  tag: string;
  name: string;
  fame: number;
  periodPoints: number;
  participants: number;
  activePlayers: number;
  totalDecksUsed: number;
  totalDecksToday: number;
  activityScore: number;
  clan: RiverClan;
};

export type OpponentWeek = {
  seasonId: number | null;
  sectionIndex: number | null;
  createdAt: Date | null;
  rank: number | null;
  trophyChange: number;
  fame: number;
  totalParticipants: number;
  activeParticipants: number;
  participationRate: number;
  totalDecksUsed: number;
  decksPerActive: number;
};

export const MAX_OPPONENT_WEEKS = 20;

export function toOpponentCandidate(clan: RiverClan): OpponentCandidate {
  const activePlayers = clan.participants.filter((p) => p.fame > 0).length;
  const totalDecksUsed = clan.participants.reduce((sum, p) => sum + p.decksUsed, 0);
  const totalDecksToday = clan.participants.reduce((sum, p) => sum + p.decksUsedToday, 0);
  return {
    tag: clan.tag,
    name: clan.name || "Unknown",
    fame: clan.fame,
    periodPoints: clan.periodPoints,
    participants: clan.participants.length,
    activePlayers,
    totalDecksUsed,
    totalDecksToday,
    activityScore:
      clan.fame * 0.4 + clan.periodPoints * 0.4 + activePlayers * 50 + totalDecksUsed * 10,
    clan,
  };
}

function maxBy<T>(items: T[], value: (item: T) => number): T {
  return items.reduce((best, item) => (value(item) > value(best) ? item : best));
}

/**
 * Most active other clan of the current race. When every candidate scores 0 the
 * one with most participants is taken instead.
 */
export function pickOpponent(race: CurrentRiverRace, ownTag: string): OpponentCandidate | null {
  const own = normalizeTag(ownTag);
  const pool = [...race.clans];
  if (race.clan && race.clan.tag !== own) pool.push(race.clan);

  const candidates = pool
    .filter((c) => c.tag !== "" && c.tag !== own)
    .map(toOpponentCandidate);
  if (candidates.length === 0) return null;

  const best = maxBy(candidates, (c) => c.activityScore);
  if (best.activityScore === 0) return maxBy(candidates, (c) => c.participants);
  return best;
}

/** Weekly performance of `opponentTag` in its own river race log, newest first. */
export function analyzeOpponentHistory(
  opponentTag: string,
  log: RiverLog,
  maxWeeks = MAX_OPPONENT_WEEKS
): OpponentWeek[] {
  const tag = normalizeTag(opponentTag);
  const weeks: OpponentWeek[] = [];

  for (const entry of log.items) {
    const standing = entry.standings.find((s) => s.clan.tag === tag);
    if (!standing) continue;

    const participants = standing.clan.participants;
    const activeParticipants = participants.filter((p) => p.decksUsed > 0).length;
    const totalDecksUsed = participants.reduce((sum, p) => sum + p.decksUsed, 0);
    weeks.push({
      seasonId: entry.seasonId,
      sectionIndex: entry.sectionIndex,
      createdAt: entry.createdAt,
      rank: standing.rank,
      trophyChange: standing.trophyChange,
      fame: standing.clan.fame,
      totalParticipants: participants.length,
      activeParticipants,
      participationRate: participants.length > 0 ? activeParticipants / participants.length : 0,
      totalDecksUsed,
      decksPerActive: activeParticipants > 0 ? totalDecksUsed / activeParticipants : 0,
    });
  }

  // undated weeks go last; equal instants keep log order
  weeks.sort((a, b) => {
    const ta = a.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    const tb = b.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (ta === tb) return 0;
    return tb > ta ? 1 : -1;
  });
  return weeks.slice(0, maxWeeks);
}
