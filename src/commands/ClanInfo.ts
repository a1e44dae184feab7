import type { Command } from "../Command";
import { renderClanInfo } from "../reports/clanInfo";

export const ClanInfo: Command = {
  name: "claninfo",
  description: "Show the clan profile",
  build: async (_args, { config, royale }) => {
    const clan = await royale.getClan();
    return renderClanInfo(clan, config.clanTag, config.maxMessageLength);
  },
};
