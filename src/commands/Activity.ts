import type { Command } from "../Command";
import { renderActivity } from "../reports/members";

export const Activity: Command = {
  name: "activity",
  description: "List members from longest offline to most recently seen",
  build: async (_args, { config, royale, now }) => {
    const members = await royale.getMembers();
    return renderActivity(members, now(), config.timeZone, config.maxMessageLength);
  },
};
