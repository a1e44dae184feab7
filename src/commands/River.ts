import { ApplicationCommandOptionType } from "discord.js";
import type { Command } from "../Command";
import { firstArg } from "../helper/commandArgs";
import { SCOREBOARD_MODES, type ScoreboardMode, renderRiverScoreboard } from "../reports/riverRace";

export function parseScoreboardMode(arg: string): ScoreboardMode {
  return SCOREBOARD_MODES.find((mode) => mode === arg) ?? "auto";
}

export const River: Command = {
  name: "river",
  description: "Compare river race points of all clans",
  options: [
    {
      name: "mode",
      description: "auto, today or total",
      type: ApplicationCommandOptionType.String,
      required: false,
      choices: SCOREBOARD_MODES.map((mode) => ({ name: mode, value: mode })),
    },
  ],
  build: async (args, { config, river }) => {
    const race = await river.getCurrentRiverFresh();
    return renderRiverScoreboard(
      race,
      config.clanTag,
      parseScoreboardMode(firstArg(args)),
      config.maxMessageLength
    );
  },
};
