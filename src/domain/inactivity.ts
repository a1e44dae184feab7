import { type ClanMember, type CurrentRiverRace, MAX_DECKS_PER_DAY, findOwnRiverClan } from "./royale";
import { daysSince } from "./time";
import type { PlayerAggregate } from "./warHistory";

export const INACTIVITY_CRITERIA = [
  "total",
  "donations",
  "war-attacks",
  "war-points",
  "trophy-road",
] as const;

export type InactivityCriterion = (typeof INACTIVITY_CRITERIA)[number];

export const DEFAULT_EXPECTED_FAME = 800;
export const MAX_EXPECTED_FAME = 2000;

const WEIGHTS = {
  warAttacks: 0.35,
  warPoints: 0.3,
  donations: 0.2,
  perDayOffline: 5,
  trophies: 0.05,
};

export type PlayerActivityScore = {
  tag: string;
  name: string;
  role: string;
  fame: number;
  decksUsed: number;
  decksUsedToday: number;
  boatAttacks: number;
  donations: number;
  trophies: number;
  clanRank: number;
  daysOffline: number;
  donationScore: number;
  warAttackScore: number;
  warPointsScore: number;
  trophyScore: number;
  totalScore: number;
};

export function isInactivityCriterion(value: string): value is InactivityCriterion {
  return (INACTIVITY_CRITERIA as readonly string[]).includes(value);
}

export function criterionValue(score: PlayerActivityScore, criterion: InactivityCriterion): number {
  switch (criterion) {
    case "donations":
      return score.donationScore;
    case "war-attacks":
      return score.warAttackScore;
    case "war-points":
      return score.warPointsScore;
    case "trophy-road":
      return score.trophyScore;
    case "total":
      return score.totalScore;
  }
}

type ScoreOptions = {
  history?: Map<string, PlayerAggregate>;
  criterion?: InactivityCriterion;
  now?: Date;
  maxDecks?: number;
};

/**
 * Score every member; higher means less active. Returned most-inactive first,
 * ties keep the member order of the roster.
 */
export function scorePlayers(
  members: ClanMember[],
  race: CurrentRiverRace,
  ownTag: string,
  options: ScoreOptions = {}
): PlayerActivityScore[] {
  const { history, criterion = "total", now = new Date(), maxDecks = MAX_DECKS_PER_DAY } = options;
  const participants = new Map(
    (findOwnRiverClan(race, ownTag)?.participants ?? []).map((p) => [p.tag, p])
  );

  const scores = members.map((member): PlayerActivityScore => {
    const p = participants.get(member.tag);
    const fame = p?.fame ?? 0;
    const decksUsed = p?.decksUsed ?? 0;
    const past = history?.get(member.tag);
    const hasHistory = past !== undefined && past.wars > 0;

    const expectedAttacks = hasHistory
      ? Math.min(2 * (past.decksUsed / past.wars), 2 * maxDecks)
      : 2 * maxDecks;
    const expectedFame = hasHistory
      ? Math.min(past.fame / past.wars, MAX_EXPECTED_FAME)
      : DEFAULT_EXPECTED_FAME;

    const donationScore = 1000 - member.donations;
    const warAttackScore = (expectedAttacks - decksUsed) * 100;
    const warPointsScore = expectedFame - fame;
    const trophyScore = member.clanRank * 10 + (10000 - Math.min(member.trophies, 10000)) / 10;
    const daysOffline = daysSince(member.lastSeen, now);

    return {
      tag: member.tag,
      name: member.name,
      role: member.role,
      fame,
      decksUsed,
      decksUsedToday: p?.decksUsedToday ?? 0,
      boatAttacks: p?.boatAttacks ?? 0,
      donations: member.donations,
      trophies: member.trophies,
      clanRank: member.clanRank,
      daysOffline,
      donationScore,
      warAttackScore,
      warPointsScore,
      trophyScore,
      totalScore:
        WEIGHTS.warAttacks * warAttackScore +
        WEIGHTS.warPoints * warPointsScore +
        WEIGHTS.donations * donationScore +
        WEIGHTS.perDayOffline * daysOffline +
        WEIGHTS.trophies * trophyScore,
    };
  });

  return scores.sort((a, b) => criterionValue(b, criterion) - criterionValue(a, criterion));
}
