import type {
  ClanMember,
  CurrentRiverRace,
  RiverClan,
  RiverLog,
  RiverLogEntry,
  RiverParticipant,
} from "../src/domain/royale";

export function participant(overrides: Partial<RiverParticipant> = {}): RiverParticipant {
  return {
    tag: "P0",
    name: "Player",
    fame: 0,
    repairPoints: 0,
    boatAttacks: 0,
    decksUsed: 0,
    decksUsedToday: 0,
    ...overrides,
  };
}

export function riverClan(overrides: Partial<RiverClan> = {}): RiverClan {
  return {
    tag: "OWN1",
    name: "Own Clan",
    fame: 0,
    periodPoints: 0,
    repairPoints: 0,
    finishTime: null,
    participants: [],
    ...overrides,
  };
}

export function race(clan: RiverClan | null, clans: RiverClan[] = []): CurrentRiverRace {
  return { state: "full", periodIndex: 3, clan, clans };
}

export function member(overrides: Partial<ClanMember> = {}): ClanMember {
  return {
    tag: "M0",
    name: "Member",
    role: "member",
    trophies: 5000,
    clanRank: 1,
    donations: 0,
    donationsReceived: 0,
    lastSeen: null,
    ...overrides,
  };
}

export function logEntry(createdAt: Date | null, clans: RiverClan[], seasonId = 100, sectionIndex = 0): RiverLogEntry {
  return {
    seasonId,
    sectionIndex,
    createdAt,
    standings: clans.map((clan, i) => ({ rank: i + 1, trophyChange: 20 - i * 10, clan })),
  };
}

export function riverLog(...items: RiverLogEntry[]): RiverLog {
  return { items };
}

/** Own clan where `untouched` of `total` participants used no deck today. */
export function raceWithUntouched(untouched: number, total: number): CurrentRiverRace {
  const participants = Array.from({ length: total }, (_, i) =>
    participant({ tag: `P${i}`, name: `P${i}`, decksUsedToday: i < untouched ? 0 : 2 })
  );
  return race(riverClan({ participants }));
}
