import { ApplicationCommandOptionType } from "discord.js";
import type { Command } from "../Command";
import { scorePlayers } from "../domain/inactivity";
import { findOwnRiverClan } from "../domain/royale";
import { aggregateWarHistory } from "../domain/warHistory";
import { findMembers, renderPlayerDetails } from "../reports/playerDetails";

export const Player: Command = {
  name: "player",
  description: "Details of one clan member",
  options: [
    {
      name: "name",
      description: "Player name or tag",
      type: ApplicationCommandOptionType.String,
      required: true,
    },
  ],
  build: async (args, { config, royale, river, now }) => {
    const query = args.join(" ").trim();
    if (!query) return "Provide a player name or tag.";

    const members = await royale.getMembers();
    const found = findMembers(members, query);
    if (found.length === 0) return `No clan member matches "${query}".`;

    const race = await river.getCurrentRiverFresh();
    const log = await royale.getRiverLog(undefined, config.warHistoryLimit);
    const history = aggregateWarHistory(log, config.clanTag);
    const at = now();
    const scores = scorePlayers(members, race, config.clanTag, { history, now: at });
    const participants = findOwnRiverClan(race, config.clanTag)?.participants ?? [];

    return found.map((member) => {
      const rank = scores.findIndex((s) => s.tag === member.tag);
      return renderPlayerDetails(
        {
          member,
          participant: participants.find((p) => p.tag === member.tag) ?? null,
          history: history.get(member.tag) ?? null,
          score: rank >= 0 ? scores[rank] : null,
          inactivityRank: rank >= 0 ? rank + 1 : null,
          memberCount: members.length,
        },
        { now: at, timeZone: config.timeZone, maxLength: config.maxMessageLength }
      );
    });
  },
};
