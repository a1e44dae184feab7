import {
  type CurrentRiverRace,
  MAX_DECKS_PER_DAY,
  type RiverClan,
  displayName,
  findOwnRiverClan,
} from "../domain/royale";
import { normalizeTag } from "../domain/tag";
import { formatClock } from "../domain/time";
import { compareNames, rankLabel, truncateDiscordContent } from "../helper/discordContent";

export type OpenAttackRow = {
  name: string;
  remaining: number;
  usedToday: number;
};

/**
 * Players with decks left first (most left, then fewest used, then name),
 * followed by the finished players by name.
 */
export function orderOpenAttacks(clan: RiverClan | null, maxDecks = MAX_DECKS_PER_DAY): OpenAttackRow[] {
  const rows = (clan?.participants ?? []).map((p) => ({
    name: displayName(p.name),
    remaining: Math.max(maxDecks - p.decksUsedToday, 0),
    usedToday: p.decksUsedToday,
  }));
  const open = rows
    .filter((r) => r.remaining > 0)
    .sort(
      (a, b) => b.remaining - a.remaining || a.usedToday - b.usedToday || compareNames(a.name, b.name)
    );
  const done = rows.filter((r) => r.remaining === 0).sort((a, b) => compareNames(a.name, b.name));
  return [...open, ...done];
}

export function renderOpenAttacks(
  race: CurrentRiverRace,
  ownTag: string,
  options: { now: Date; timeZone: string; maxDecks?: number; maxLength?: number }
): string {
  const maxDecks = options.maxDecks ?? MAX_DECKS_PER_DAY;
  const own = findOwnRiverClan(race, ownTag);
  const rows = orderOpenAttacks(own, maxDecks);

  const lines = [`📋 ${own?.name || "Our clan"} – open attacks (today)`, ""];
  rows.forEach((r, i) => {
    const done = r.remaining === 0 && r.usedToday >= maxDecks ? " ✅" : "";
    lines.push(`${rankLabel(i)} ${r.name} — ${r.remaining} open (${r.usedToday}/${maxDecks})${done}`);
  });

  const ownClanTag = normalizeTag(ownTag);
  const opponents = race.clans
    .filter((c) => c.tag !== "" && c.tag !== ownClanTag)
    .map((c) => {
      const open = c.participants.reduce(
        (sum, p) => sum + Math.max(maxDecks - p.decksUsedToday, 0),
        0
      );
      return `• ${c.name || "?"} — ${open}/${c.participants.length * maxDecks} still open`;
    });
  if (opponents.length > 0) {
    lines.push("", "🆚 Opponents (today)", ...opponents);
  }

  const totalRemaining = rows.reduce((sum, r) => sum + r.remaining, 0);
  lines.push("", `Σ open today: ${totalRemaining}`);
  lines.push(`🕒 Data as of: ${formatClock(options.now, options.timeZone)} (${options.timeZone})`);
  return truncateDiscordContent(lines.join("\n"), options.maxLength);
}

export const SCOREBOARD_MODES = ["auto", "today", "total"] as const;
export type ScoreboardMode = (typeof SCOREBOARD_MODES)[number];

type ScoreboardRow = { tag: string; name: string; fame: number; period: number };

export function renderRiverScoreboard(
  race: CurrentRiverRace,
  ownTag: string,
  mode: ScoreboardMode,
  maxLength?: number
): string {
  const seen = new Set<string>();
  const rows: ScoreboardRow[] = [];
  for (const c of [race.clan, ...race.clans]) {
    if (!c || !c.tag || seen.has(c.tag)) continue;
    seen.add(c.tag);
    rows.push({ tag: c.tag, name: c.name || "Unknown", fame: c.fame, period: c.periodPoints });
  }
  if (rows.length === 0) return "No river race data available.";

  const ownClanTag = normalizeTag(ownTag);
  const own = rows.find((r) => r.tag === ownClanTag) ?? rows[0];
  const usePeriod = mode === "today" || (mode === "auto" && rows.some((r) => r.period > 0));
  const metric = (r: ScoreboardRow) => (usePeriod ? r.period : r.fame);

  rows.sort((a, b) => metric(b) - metric(a) || compareNames(a.name, b.name));

  const lines = [`🏁 **River race points (${usePeriod ? "today" : "total"})**`, ""];
  rows.forEach((r, i) => {
    const value = metric(r);
    const delta = value - metric(own);
    const sign = delta === 0 ? "±" : delta > 0 ? "+" : "−";
    const me = r.tag === own.tag ? " ⭐" : "";
    lines.push(
      `${rankLabel(i)} ${r.name} (#${r.tag}) — points: **${value}** | today: ${r.period} | total: ${r.fame} | Δ to us: ${sign}${Math.abs(delta)}${me}`
    );
  });
  return truncateDiscordContent(lines.join("\n"), maxLength);
}
