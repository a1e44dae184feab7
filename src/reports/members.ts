import { type ClanMember, displayName } from "../domain/royale";
import { formatAgo } from "../domain/time";
import { compareNames, rankLabel, truncateDiscordContent } from "../helper/discordContent";

/** Longest offline first; members never seen sort before everyone else. */
export function sortByLastSeen(members: ClanMember[]): ClanMember[] {
  return [...members].sort(
    (a, b) =>
      (a.lastSeen?.getTime() ?? Number.MIN_SAFE_INTEGER) -
      (b.lastSeen?.getTime() ?? Number.MIN_SAFE_INTEGER)
  );
}

export function renderActivity(
  members: ClanMember[],
  now: Date,
  timeZone: string,
  limit?: number
): string {
  const lines = ["📊 Activity (top: offline longest, bottom: seen most recently)", ""];
  sortByLastSeen(members).forEach((m, i) => {
    lines.push(`${rankLabel(i)} ${displayName(m.name)} (${m.role}) — ${formatAgo(m.lastSeen, now, timeZone)}`);
  });
  return truncateDiscordContent(lines.join("\n"), limit);
}

/** Donations desc, then name; `0` keeps every row. */
export function sortDonations(members: ClanMember[], limit: number): ClanMember[] {
  const sorted = [...members].sort(
    (a, b) => b.donations - a.donations || compareNames(a.name, b.name)
  );
  return limit > 0 ? sorted.slice(0, limit) : sorted;
}

export function renderDonations(
  members: ClanMember[],
  options: { limit: number; includeReceived?: boolean; maxLength?: number }
): string {
  const includeReceived = options.includeReceived ?? true;
  const lines = ["🎁 **Donation leaderboard** (this week)", ""];
  sortDonations(members, options.limit).forEach((m, i) => {
    const received = includeReceived ? ` | received: ${m.donationsReceived}` : "";
    lines.push(`${rankLabel(i)} ${displayName(m.name)} — donated: **${m.donations}**${received}`);
  });

  const totalDonated = members.reduce((sum, m) => sum + m.donations, 0);
  const totalReceived = members.reduce((sum, m) => sum + m.donationsReceived, 0);
  lines.push("");
  lines.push(
    `Σ donated: ${totalDonated}${includeReceived ? ` | Σ received: ${totalReceived}` : ""}`
  );
  return truncateDiscordContent(lines.join("\n"), options.maxLength);
}
