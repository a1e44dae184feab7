import { normalizeTag, sameTag } from "./tag";
import { firstRoyaleTime, parseRoyaleTime } from "./time";

export const MAX_DECKS_PER_DAY = 4;
export const MAX_CLAN_MEMBERS = 50;

export type ClanSummary = {
  tag: string;
  name: string;
  memberCount: number;
  score: number;
  requiredScore: number;
  description: string;
  memberTags: string[];
};

export type ClanMember = {
  tag: string;
  name: string;
  role: string;
  trophies: number;
  clanRank: number;
  donations: number;
  donationsReceived: number;
  lastSeen: Date | null;
};

export type RiverParticipant = {
  tag: string;
  name: string;
  fame: number;
  repairPoints: number;
  boatAttacks: number;
  decksUsed: number;
  decksUsedToday: number;
};

export type RiverClan = {
  tag: string;
  name: string;
  fame: number;
  periodPoints: number;
  repairPoints: number;
  finishTime: Date | null;
  participants: RiverParticipant[];
};

export type CurrentRiverRace = {
  state: string;
  periodIndex: number | null;
  clan: RiverClan | null;
  clans: RiverClan[];
};

export type RiverStanding = {
  rank: number | null;
  trophyChange: number;
  clan: RiverClan;
};

export type RiverLogEntry = {
  seasonId: number | null;
  sectionIndex: number | null;
  createdAt: Date | null;
  standings: RiverStanding[];
};

export type RiverLog = {
  items: RiverLogEntry[];
};

type JsonRecord = Record<string, unknown>;

function asRecord(value: unknown): JsonRecord {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asString(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return "";
}

function asOptionalString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function asInt(value: unknown): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

function asNullableInt(value: unknown): number | null {
  if (value === null || value === undefined || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? Math.trunc(n) : null;
}

export function parseClanSummary(raw: unknown): ClanSummary {
  const obj = asRecord(raw);
  const memberTags = asArray(obj.memberList)
    .map((m) => normalizeTag(asString(asRecord(m).tag)))
    .filter(Boolean);
  return {
    tag: normalizeTag(asString(obj.tag)),
    name: asString(obj.name),
    memberCount: obj.members === undefined ? memberTags.length : asInt(obj.members),
    score: asInt(obj.clanScore),
    requiredScore: asInt(obj.requiredTrophies),
    description: asString(obj.description),
    memberTags,
  };
}

export function parseClanMember(raw: unknown): ClanMember {
  const obj = asRecord(raw);
  return {
    tag: normalizeTag(asString(obj.tag)),
    name: asString(obj.name),
    role: asString(obj.role),
    trophies: asInt(obj.trophies),
    clanRank: asInt(obj.clanRank),
    donations: asInt(obj.donations),
    donationsReceived: asInt(obj.donationsReceived),
    lastSeen: parseRoyaleTime(asOptionalString(obj.lastSeen)),
  };
}

export function parseMembers(raw: unknown): ClanMember[] {
  return asArray(asRecord(raw).items).map(parseClanMember);
}

export function parseRiverParticipant(raw: unknown): RiverParticipant {
  const obj = asRecord(raw);
  return {
    tag: normalizeTag(asString(obj.tag)),
    name: asString(obj.name),
    fame: asInt(obj.fame),
    repairPoints: asInt(obj.repairPoints),
    boatAttacks: asInt(obj.boatAttacks),
    decksUsed: asInt(obj.decksUsed),
    decksUsedToday: asInt(obj.decksUsedToday),
  };
}

export function parseRiverClan(raw: unknown): RiverClan {
  const obj = asRecord(raw);
  return {
    tag: normalizeTag(asString(obj.tag)),
    name: asString(obj.name),
    // older race payloads report the running total as `points`
    fame: asInt(obj.fame) || asInt(obj.points),
    periodPoints: asInt(obj.periodPoints),
    repairPoints: asInt(obj.repairPoints),
    finishTime: parseRoyaleTime(asOptionalString(obj.finishTime)),
    participants: asArray(obj.participants).map(parseRiverParticipant),
  };
}

export function parseCurrentRiverRace(raw: unknown): CurrentRiverRace {
  const obj = asRecord(raw);
  const clan = obj.clan === null || obj.clan === undefined ? null : parseRiverClan(obj.clan);
  return {
    state: asString(obj.state),
    periodIndex: asNullableInt(obj.periodIndex),
    clan,
    clans: asArray(obj.clans).map(parseRiverClan),
  };
}

export function parseRiverLog(raw: unknown): RiverLog {
  const items = asArray(asRecord(raw).items).map((item): RiverLogEntry => {
    const obj = asRecord(item);
    return {
      seasonId: asNullableInt(obj.seasonId),
      sectionIndex: asNullableInt(obj.sectionIndex),
      createdAt: firstRoyaleTime(
        asOptionalString(obj.createdDate),
        asOptionalString(obj.endTime),
        asOptionalString(obj.finishedTime),
        asOptionalString(obj.updatedTime)
      ),
      standings: asArray(obj.standings).map((standing) => {
        const st = asRecord(standing);
        return {
          rank: asNullableInt(st.rank),
          trophyChange: asInt(st.trophyChange),
          clan: parseRiverClan(st.clan),
        };
      }),
    };
  });
  return { items };
}

/** Own clan of a race payload: `clan` when its tag matches, else the matching `clans` entry. */
export function findOwnRiverClan(race: CurrentRiverRace, ownTag: string): RiverClan | null {
  if (race.clan && sameTag(race.clan.tag, ownTag)) return race.clan;
  return race.clans.find((c) => sameTag(c.tag, ownTag)) ?? null;
}

export function displayName(name: string): string {
  return name || "Unknown";
}
