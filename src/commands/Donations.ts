import { ApplicationCommandOptionType } from "discord.js";
import type { Command } from "../Command";
import { firstArg, parseLimitArg } from "../helper/commandArgs";
import { renderDonations } from "../reports/members";

export const Donations: Command = {
  name: "donations",
  description: "Donation leaderboard of this week",
  options: [
    {
      name: "limit",
      description: "Number of players to show, or `all`",
      type: ApplicationCommandOptionType.String,
      required: false,
    },
  ],
  build: async (args, { config, royale }) => {
    const members = await royale.getMembers();
    return renderDonations(members, {
      limit: parseLimitArg(firstArg(args), config.donationsLimit),
      includeReceived: true,
      maxLength: config.maxMessageLength,
    });
  },
};
