import { ApplicationCommandOptionType } from "discord.js";
import type { Command } from "../Command";
import { attemptsForArgs } from "../helper/commandArgs";
import { renderOpenAttacks } from "../reports/riverRace";

export const OpenAttacks: Command = {
  name: "open-attacks",
  description: "Show decks still open today in the river race",
  options: [
    {
      name: "refresh",
      description: "Use `refresh` to retry harder when the data looks cached",
      type: ApplicationCommandOptionType.String,
      required: false,
    },
  ],
  build: async (args, { config, river, now }) => {
    const race = await river.getCurrentRiverFresh(attemptsForArgs(args, config.freshAttempts));
    return renderOpenAttacks(race, config.clanTag, {
      now: now(),
      timeZone: config.timeZone,
      maxLength: config.maxMessageLength,
    });
  },
};
