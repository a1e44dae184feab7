import type { Command } from "../Command";

export const Spy: Command = {
  name: "spy",
  description: "Scout the most active opponent clan with its history",
  build: async (_args, { spy }) => spy.scout(),
};
