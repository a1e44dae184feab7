import type { OpponentCandidate, OpponentWeek } from "../domain/opponent";
import { MAX_CLAN_MEMBERS, displayName } from "../domain/royale";
import { formatNumber, progressBar, truncateDiscordContent } from "../helper/discordContent";

const MAX_TABLE_WEEKS = 15;

function percent(share: number): string {
  return `${Math.floor(share * 100)}%`;
}

export function renderSpySummary(
  opponent: OpponentCandidate,
  totalMembers: number,
  maxLength?: number
): string {
  const rate = opponent.participants > 0 ? opponent.activePlayers / opponent.participants : 0;
  return truncateDiscordContent(
    [
      "**Opponent scouting: most active clan**",
      "",
      `**${opponent.name}** (#${opponent.tag})`,
      `Clan members: **${totalMembers}/${MAX_CLAN_MEMBERS}**`,
      `River race: **${opponent.participants}** participants | **${opponent.activePlayers}** active (${percent(rate)})`,
      `Activity: \`${progressBar(rate)}\``,
      "",
      "**Current performance:**",
      `Total points: **${formatNumber(opponent.fame)}**`,
      `Today: **${formatNumber(opponent.periodPoints)}** points`,
    ].join("\n"),
    maxLength
  );
}

function weekLabel(week: OpponentWeek, index: number): string {
  return week.seasonId !== null ? `S${week.seasonId}.${week.sectionIndex ?? 0}` : `W-${index + 1}`;
}

function compactFame(fame: number): string {
  const full = formatNumber(fame);
  return full.length > 6 ? `${Math.floor(fame / 1000)}k` : full;
}

export function renderOpponentHistory(
  opponent: Pick<OpponentCandidate, "name" | "tag">,
  weeks: OpponentWeek[],
  maxLength?: number
): string {
  const lines = [
    `**🕵️ History: ${opponent.name}**`,
    `\`#${opponent.tag}\``,
    "",
    `**📊 Last ${weeks.length} weeks:**`,
    "",
  ];
  if (weeks.length === 0) {
    lines.push("⚠️ No history available.");
    return truncateDiscordContent(lines.join("\n"), maxLength);
  }

  const table = ["Week  | Rank | Trophies | Points  | Rate | Decks", "------|------|----------|---------|------|------"];
  weeks.slice(0, MAX_TABLE_WEEKS).forEach((w, i) => {
    const trophies = w.trophyChange > 0 ? `+${w.trophyChange}` : String(w.trophyChange);
    table.push(
      [
        weekLabel(w, i).padStart(5),
        String(w.rank ?? "?").padStart(4),
        trophies.padStart(8),
        compactFame(w.fame).padStart(7),
        percent(w.participationRate).padStart(4),
        w.decksPerActive.toFixed(1).padStart(5),
      ].join(" | ")
    );
  });
  lines.push("```", ...table, "```");

  if (weeks.length > MAX_TABLE_WEEKS) {
    lines.push(`_… and ${weeks.length - MAX_TABLE_WEEKS} more weeks_`);
  }

  const avg = (pick: (w: OpponentWeek) => number) =>
    weeks.reduce((sum, w) => sum + pick(w), 0) / weeks.length;
  const avgParticipation = avg((w) => w.participationRate);
  lines.push(
    "",
    "**📈 Averages:**",
    `• Rank: **${avg((w) => w.rank ?? 0).toFixed(1)}**`,
    `• Points/week: **${formatNumber(avg((w) => w.fame))}**`,
    `• Participation: **${percent(avgParticipation)}**`,
    `• Rate: \`${progressBar(avgParticipation)}\``,
    `• Decks/active player: **${avg((w) => w.decksPerActive).toFixed(1)}**`
  );
  return truncateDiscordContent(lines.join("\n"), maxLength);
}

export function renderSpyDetails(opponent: OpponentCandidate, maxLength?: number): string {
  const participants = opponent.clan.participants;
  const topByFame = participants
    .filter((p) => p.fame > 0)
    .sort((a, b) => b.fame - a.fame)
    .slice(0, 5);
  const topByDecks = participants
    .filter((p) => p.decksUsed > 0 || p.decksUsedToday > 0)
    .sort((a, b) => b.decksUsed - a.decksUsed)
    .slice(0, 5);

  const lines = [`**Details: ${opponent.name}**`, "", "**Top players (total points):**"];
  topByFame.forEach((p, i) => {
    lines.push(`${i + 1}. ${displayName(p.name)} - ${formatNumber(p.fame)} points (${p.decksUsed}D, ${p.boatAttacks}B)`);
  });
  if (topByFame.length === 0) lines.push("- No active players found");

  lines.push("", "**Most active players (decks used):**");
  topByDecks.forEach((p, i) => {
    const today = p.decksUsedToday > 0 ? ` (+${p.decksUsedToday} today)` : "";
    lines.push(`${i + 1}. ${displayName(p.name)} - ${p.decksUsed} decks${today}`);
  });
  if (topByDecks.length === 0) lines.push("- No deck usage found");

  const totalFame = participants.reduce((sum, p) => sum + p.fame, 0);
  const totalBoats = participants.reduce((sum, p) => sum + p.boatAttacks, 0);
  const participation =
    opponent.participants > 0 ? Math.floor((opponent.activePlayers / opponent.participants) * 100) : 0;
  lines.push(
    "",
    "**Clan stats:**",
    `- Ø points/player: ${participants.length > 0 ? Math.round(totalFame / participants.length) : 0}`,
    `- Decks total: ${opponent.totalDecksUsed}`,
    `- Boat attacks total: ${totalBoats}`,
    `- Participation: ${opponent.activePlayers}/${opponent.participants} (${participation}%)`
  );
  return truncateDiscordContent(lines.join("\n"), maxLength);
}
