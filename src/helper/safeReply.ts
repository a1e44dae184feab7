import type { ChatInputCommandInteraction } from "discord.js";
import type { ReportResult } from "../Command";
import { truncateDiscordContent } from "./discordContent";
import { formatError } from "./formatError";

const IGNORED_DISCORD_CODES = new Set([
  40060, // already acknowledged
  10062, // unknown interaction
]);

function discordErrorCode(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("code" in err)) return null;
  return typeof err.code === "number" ? err.code : null;
}

type ReplyTarget = Pick<ChatInputCommandInteraction, "deferred" | "replied" | "reply" | "editReply" | "followUp">;

/**
 * Sends report messages for one interaction: the first one fills the deferred
 * reply, later ones are follow-ups.
 */
export class ReplyChannel {
  private sentFirst = false;

  constructor(private readonly interaction: ReplyTarget) {}

  async send(content: string): Promise<void> {
    const safeContent = truncateDiscordContent(content);
    try {
      if (!this.sentFirst && this.interaction.deferred && !this.interaction.replied) {
        await this.interaction.editReply({ content: safeContent });
      } else if (!this.sentFirst && !this.interaction.deferred && !this.interaction.replied) {
        await this.interaction.reply({ content: safeContent });
      } else {
        await this.interaction.followUp({ content: safeContent });
      }
      this.sentFirst = true;
    } catch (err) {
      const code = discordErrorCode(err);
      if (code !== null && IGNORED_DISCORD_CODES.has(code)) return;
      console.error(`safeReply unexpected error: ${formatError(err)}`);
    }
  }

  async deliver(result: ReportResult): Promise<void> {
    if (result === null) return;
    for (const content of typeof result === "string" ? [result] : result) {
      await this.send(content);
    }
  }
}
