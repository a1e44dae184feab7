import { ApplicationCommandOptionType } from "discord.js";
import type { Command } from "../Command";
import { firstArg } from "../helper/commandArgs";

type CommandDoc = {
  summary: string;
  details: string[];
  examples: string[];
};

const COMMAND_DOCS: Record<string, CommandDoc> = {
  help: {
    summary: "Show this overview or the details of one command.",
    details: ["Pass a command name to see its options and examples."],
    examples: ["/help", "/help command:spy"],
  },
  status: {
    summary: "Check that the bot is running.",
    details: ["Also shows how many river race fetches ran since start."],
    examples: ["/status"],
  },
  version: {
    summary: "Show the deployed commit.",
    details: [],
    examples: ["/version"],
  },
  claninfo: {
    summary: "Clan profile: members, trophies, requirements.",
    details: [],
    examples: ["/claninfo"],
  },
  activity: {
    summary: "Members from longest offline to most recently seen.",
    details: ["Members the API never saw are listed first."],
    examples: ["/activity"],
  },
  "open-attacks": {
    summary: "Decks still open today in the river race.",
    details: [
      "Players with open decks come first, finished players after them.",
      "The live race endpoint is cached upstream; stale-looking data is fetched again.",
      "`refresh` allows one more refetch.",
    ],
    examples: ["/open-attacks", "/open-attacks refresh:refresh"],
  },
  river: {
    summary: "River race points of all clans compared to ours.",
    details: ["`auto` uses today's points once any clan has some, total points otherwise."],
    examples: ["/river", "/river mode:today", "/river mode:total"],
  },
  donations: {
    summary: "Donation leaderboard of this week.",
    details: ["Ties are ordered by name.", "`all` shows every member."],
    examples: ["/donations", "/donations limit:20", "/donations limit:all"],
  },
  "war-history": {
    summary: "River race history from the race log.",
    details: [
      "Without a player: every player ranked by fame + repair points.",
      "With a player: exact name, then partial name, then tag.",
    ],
    examples: ["/war-history", "/war-history player:Alice"],
  },
  inactive: {
    summary: "Least active players by a weighted inactivity score.",
    details: [
      "Combines war attacks, war points, donations, days offline and trophy road.",
      "War baselines come from each player's own river race history.",
      "Sort by `total`, `donations`, `war-attacks`, `war-points` or `trophy-road`.",
    ],
    examples: ["/inactive", "/inactive sort:donations"],
  },
  player: {
    summary: "Profile, current race and history of one member.",
    details: ["Accepts a name or a tag."],
    examples: ["/player name:Alice", "/player name:#ABC123"],
  },
  spy: {
    summary: "Scout the most active opponent of the current race.",
    details: [
      "Sends a summary, the opponent's recent weeks and its current top players.",
      "Missing history or profile data is reported instead of failing the command.",
    ],
    examples: ["/spy"],
  },
};

export function getHelpDocumentedCommandNames(): string[] {
  return Object.keys(COMMAND_DOCS).sort((a, b) => a.localeCompare(b));
}

export function renderHelp(commandName?: string): string {
  const name = (commandName ?? "").replace(/^\//, "");
  const doc = name ? COMMAND_DOCS[name] : undefined;
  if (doc) {
    return [
      `**/${name}** – ${doc.summary}`,
      ...doc.details.map((d) => `• ${d}`),
      "",
      "**Examples**",
      ...doc.examples.map((e) => `\`${e}\``),
    ].join("\n");
  }

  const lines = ["📋 **Available commands**", ""];
  for (const [docName, entry] of Object.entries(COMMAND_DOCS)) {
    lines.push(`/${docName} – ${entry.summary}`);
  }
  lines.push("", "Use `/help command:<name>` for details.");
  return lines.join("\n");
}

export const Help: Command = {
  name: "help",
  description: "Show the available commands",
  options: [
    {
      name: "command",
      description: "Command to explain",
      type: ApplicationCommandOptionType.String,
      required: false,
    },
  ],
  build: async (args) => renderHelp(firstArg(args)),
};
