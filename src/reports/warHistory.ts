import { formatDate } from "../domain/time";
import type { HistoryMatch, PlayerAggregate } from "../domain/warHistory";
import { compareNames, rankLabel, truncateDiscordContent } from "../helper/discordContent";

export type WarHistoryRow = { key: string; aggregate: PlayerAggregate };

/** Highest fame+repair first, then most decks+boats, then name. */
export function sortWarHistory(history: Map<string, PlayerAggregate>): WarHistoryRow[] {
  const points = (a: PlayerAggregate) => a.fame + a.repairPoints;
  const volume = (a: PlayerAggregate) => a.decksUsed + a.boatAttacks;
  return [...history.entries()]
    .map(([key, aggregate]) => ({ key, aggregate }))
    .sort(
      (a, b) =>
        points(b.aggregate) - points(a.aggregate) ||
        volume(b.aggregate) - volume(a.aggregate) ||
        compareNames(a.aggregate.name, b.aggregate.name)
    );
}

export function renderWarHistorySummary(
  history: Map<string, PlayerAggregate>,
  timeZone: string,
  maxLength?: number
): string {
  if (history.size === 0) return "No war history available.";

  const lines = ["📚 **War history – overview**", ""];
  sortWarHistory(history).forEach(({ key, aggregate: e }, i) => {
    lines.push(
      `${rankLabel(i)} ${e.name} (#${key}) — attacks: ${e.decksUsed}+${e.boatAttacks} | points: **${
        e.fame + e.repairPoints
      }** (F:${e.fame} / R:${e.repairPoints}) | wars: ${e.wars} | since ${formatDate(e.firstSeen, timeZone)}`
    );
  });
  return truncateDiscordContent(lines.join("\n"), maxLength);
}

export function renderWarHistoryPlayer(
  match: HistoryMatch,
  timeZone: string,
  maxLength?: number
): string {
  const e = match.aggregate;
  return truncateDiscordContent(
    [
      `📖 **War history – ${e.name}**`,
      `Tag: #${match.key}`,
      `Since: ${formatDate(e.firstSeen, timeZone)}  |  Last war: ${formatDate(e.lastSeen, timeZone)}`,
      `Wars joined: ${e.wars}`,
      `Total points: **${e.fame + e.repairPoints}** (fame: ${e.fame}, repair: ${e.repairPoints})`,
      `Total attacks: decks ${e.decksUsed}  |  boats ${e.boatAttacks}`,
    ].join("\n"),
    maxLength
  );
}

/** Hint listing up to ten known names when a lookup finds nobody. */
export function renderNoHistoryMatch(history: Map<string, PlayerAggregate>, query: string): string {
  const names = [...new Set([...history.values()].slice(0, 10).map((e) => e.name))].sort(compareNames);
  return `No match for "${query}". Suggestions: ${names.join(", ")}`;
}
