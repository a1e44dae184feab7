import type { Command } from "../Command";
import { displayTag } from "../domain/tag";
import { getFetchTotals } from "../helper/fetchTelemetry";

export const Status: Command = {
  name: "status",
  description: "Check that the bot is running",
  build: async (_args, { config }) => {
    const race = getFetchTotals("clashroyale", "getCurrentRiverRace");
    return [
      "✅ Bot is running and listening.",
      `Clan: ${displayTag(config.clanTag)}`,
      `River race fetches since start: ${race.api} (stale refetches: ${race.refetch})`,
    ].join("\n");
  },
};
