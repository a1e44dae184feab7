import type { PlayerActivityScore } from "../domain/inactivity";
import { type ClanMember, MAX_DECKS_PER_DAY, type RiverParticipant } from "../domain/royale";
import { formatAgo, formatDate } from "../domain/time";
import type { PlayerAggregate } from "../domain/warHistory";
import { truncateDiscordContent } from "../helper/discordContent";

export type PlayerDetailsInput = {
  member: ClanMember;
  participant: RiverParticipant | null;
  history: PlayerAggregate | null;
  score: PlayerActivityScore | null;
  inactivityRank: number | null;
  memberCount: number;
};

export function renderPlayerDetails(
  input: PlayerDetailsInput,
  options: { now: Date; timeZone: string; maxLength?: number }
): string {
  const { member, participant, history, score } = input;
  const lines = [
    `👤 **${member.name || "Unknown"}** (#${member.tag})`,
    `Role: ${member.role || "member"} | Clan rank: ${member.clanRank} | Trophies: ${member.trophies}`,
    `Donations: ${member.donations} donated / ${member.donationsReceived} received`,
    `Last seen: ${formatAgo(member.lastSeen, options.now, options.timeZone)}`,
    "",
    "**Current river race**",
  ];

  if (participant) {
    lines.push(
      `Fame: ${participant.fame} | Decks: ${participant.decksUsed} (today ${participant.decksUsedToday}/${MAX_DECKS_PER_DAY}) | Boat attacks: ${participant.boatAttacks}`
    );
  } else {
    lines.push("Not listed in the current race.");
  }

  lines.push("", "**History**");
  if (history && history.wars > 0) {
    lines.push(
      `Wars: ${history.wars} since ${formatDate(history.firstSeen, options.timeZone)}`,
      `Ø fame/war: ${Math.round(history.fame / history.wars)} | Ø decks/war: ${(
        history.decksUsed / history.wars
      ).toFixed(1)}`
    );
  } else {
    lines.push("No river race log entries.");
  }

  if (score && input.inactivityRank !== null) {
    lines.push(
      "",
      `Inactivity: **${score.totalScore.toFixed(1)}** (rank ${input.inactivityRank}/${input.memberCount}, 1 = least active)`
    );
  }
  return truncateDiscordContent(lines.join("\n"), options.maxLength);
}

/** Member lookup by exact name, then name substring, then tag. */
export function findMembers(members: ClanMember[], query: string): ClanMember[] {
  const q = query.trim().toLowerCase();
  if (!q) return [];
  const exact = members.filter((m) => m.name.toLowerCase() === q);
  if (exact.length > 0) return exact;
  const partial = members.filter((m) => m.name.toLowerCase().includes(q));
  if (partial.length > 0) return partial;
  const tag = q.replace(/^#/, "").toUpperCase();
  return members.filter((m) => m.tag === tag);
}
