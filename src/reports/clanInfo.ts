import { type ClanSummary, MAX_CLAN_MEMBERS } from "../domain/royale";
import { displayTag } from "../domain/tag";
import { truncateDiscordContent } from "../helper/discordContent";

const MAX_DESCRIPTION_LENGTH = 400;

export function renderClanInfo(clan: ClanSummary, fallbackTag: string, limit?: number): string {
  const description =
    clan.description.length > MAX_DESCRIPTION_LENGTH
      ? `${clan.description.slice(0, MAX_DESCRIPTION_LENGTH)}…`
      : clan.description;

  return truncateDiscordContent(
    [
      `**${clan.name || "Unknown"}** (${displayTag(clan.tag || fallbackTag)})`,
      `👥 Members: **${clan.memberCount}/${MAX_CLAN_MEMBERS}**`,
      `🏆 Clan trophies: **${clan.score}**`,
      `🔑 Required trophies: **${clan.requiredScore}**`,
      "—",
      description,
    ].join("\n"),
    limit
  );
}
