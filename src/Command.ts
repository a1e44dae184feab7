import type { ChatInputApplicationCommandData } from "discord.js";
import type { BotConfig } from "./config";
import type { ClashRoyaleService } from "./services/ClashRoyaleService";
import type { RiverRaceService } from "./services/RiverRaceService";
import type { SpyService } from "./services/SpyService";

/** One text block, several blocks in order, or `null` when everything went out through `send`. */
export type ReportResult = string | string[] | null;

export type CommandContext = {
  config: BotConfig;
  royale: ClashRoyaleService;
  river: RiverRaceService;
  spy: SpyService;
  now: () => Date;
  /** Sends an intermediate message before the command returns. */
  send: (content: string) => Promise<void>;
};

export interface Command extends ChatInputApplicationCommandData {
  /** Builds the report from the command's free-text arguments, in option order. */
  build: (args: string[], context: CommandContext) => Promise<ReportResult>;
}
