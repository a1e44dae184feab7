import type { ChatInputCommandInteraction } from "discord.js";
import type { Command } from "../Command";

const REFRESH_KEYWORDS = new Set(["force", "refresh", "fresh"]);
const NO_LIMIT_KEYWORDS = new Set(["all", "*"]);

/** String option values of `command` in declared order; unset options are skipped. */
export function readArgs(interaction: ChatInputCommandInteraction, command: Command): string[] {
  const args: string[] = [];
  for (const option of command.options ?? []) {
    const value = interaction.options.get(option.name)?.value;
    if (value === undefined || value === null) continue;
    const text = String(value).trim();
    if (text) args.push(...text.split(/\s+/));
  }
  return args;
}

export function firstArg(args: string[]): string {
  return (args[0] ?? "").trim().toLowerCase();
}

/** `all` means no limit (0); a positive number is taken as is; anything else gives `fallback`. */
export function parseLimitArg(arg: string, fallback: number): number {
  const value = arg.trim().toLowerCase();
  if (!value) return fallback;
  if (NO_LIMIT_KEYWORDS.has(value)) return 0;
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/** Three fresh-fetch attempts when the caller asked for a refresh. */
export function attemptsForArgs(args: string[], defaultAttempts: number): number {
  return REFRESH_KEYWORDS.has(firstArg(args)) ? Math.max(defaultAttempts, 3) : defaultAttempts;
}
