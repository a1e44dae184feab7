import { ApplicationCommandOptionType } from "discord.js";
import type { Command } from "../Command";
import { aggregateWarHistory, findHistoryMatches } from "../domain/warHistory";
import {
  renderNoHistoryMatch,
  renderWarHistoryPlayer,
  renderWarHistorySummary,
} from "../reports/warHistory";

export const WarHistory: Command = {
  name: "war-history",
  description: "River race history of the clan or of one player",
  options: [
    {
      name: "player",
      description: "Player name or tag",
      type: ApplicationCommandOptionType.String,
      required: false,
    },
  ],
  build: async (args, { config, royale, send }) => {
    const log = await royale.getRiverLog(undefined, config.warHistoryLimit);
    const history = aggregateWarHistory(log, config.clanTag);
    const query = args.join(" ").trim();

    if (!query) return renderWarHistorySummary(history, config.timeZone, config.maxMessageLength);
    if (history.size === 0) return "No war history available.";

    const matches = findHistoryMatches(history, query);
    if (matches.length === 0) return renderNoHistoryMatch(history, query);
    if (matches.length === 1) {
      return renderWarHistoryPlayer(matches[0], config.timeZone, config.maxMessageLength);
    }

    await send(`⚠️ Found ${matches.length} players matching "${query}":`);
    for (const match of matches) {
      await send(renderWarHistoryPlayer(match, config.timeZone, config.maxMessageLength));
    }
    return null;
  },
};
