import { ApplicationCommandOptionType } from "discord.js";
import type { Command } from "../Command";
import {
  INACTIVITY_CRITERIA,
  type InactivityCriterion,
  isInactivityCriterion,
  scorePlayers,
} from "../domain/inactivity";
import { aggregateWarHistory } from "../domain/warHistory";
import { firstArg } from "../helper/commandArgs";
import { renderInactivePlayers } from "../reports/inactive";

export function parseCriterion(arg: string): InactivityCriterion {
  return isInactivityCriterion(arg) ? arg : "total";
}

export const Inactive: Command = {
  name: "inactive",
  description: "List the least active players by a weighted score",
  options: [
    {
      name: "sort",
      description: "Sort criterion",
      type: ApplicationCommandOptionType.String,
      required: false,
      choices: INACTIVITY_CRITERIA.map((criterion) => ({ name: criterion, value: criterion })),
    },
  ],
  build: async (args, { config, royale, river, now }) => {
    const members = await royale.getMembers();
    const race = await river.getCurrentRiverFresh();
    const log = await royale.getRiverLog(undefined, config.warHistoryLimit);
    const criterion = parseCriterion(firstArg(args));

    const scores = scorePlayers(members, race, config.clanTag, {
      history: aggregateWarHistory(log, config.clanTag),
      criterion,
      now: now(),
    });
    return renderInactivePlayers(scores, criterion, config.inactiveLimit, config.maxMessageLength);
  },
};
