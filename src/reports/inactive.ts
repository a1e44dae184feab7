import type { InactivityCriterion, PlayerActivityScore } from "../domain/inactivity";
import { displayName } from "../domain/royale";
import { rankLabel, truncateDiscordContent } from "../helper/discordContent";

const CRITERION_LABELS: Record<InactivityCriterion, string> = {
  total: "overall score",
  donations: "donations",
  "war-attacks": "war attacks",
  "war-points": "war points",
  "trophy-road": "trophy road",
};

function formatDays(days: number): string {
  return days < 1 ? "<1d" : `${Math.floor(days)}d`;
}

export function renderInactivePlayers(
  scores: PlayerActivityScore[],
  criterion: InactivityCriterion,
  limit: number,
  maxLength?: number
): string {
  if (scores.length === 0) return "No clan members found.";

  const shown = limit > 0 ? scores.slice(0, limit) : scores;
  const lines = [
    `🔻 **Least active players** (sorted by ${CRITERION_LABELS[criterion]})`,
    "",
  ];
  shown.forEach((s, i) => {
    lines.push(`${rankLabel(i)} ${displayName(s.name)} (${s.role}) — score **${s.totalScore.toFixed(1)}**`);
    lines.push(
      `    war: ${s.decksUsed} decks, ${s.fame} fame | donations: ${s.donations} | trophies: ${s.trophies} | offline: ${formatDays(
        s.daysOffline
      )}`
    );
  });
  lines.push("", "Higher score = less active. Options: total, donations, war-attacks, war-points, trophy-road");
  return truncateDiscordContent(lines.join("\n"), maxLength);
}
