import type { Client } from "discord.js";
import { Commands } from "../Commands";
import { renderStartupNotice } from "../commands/Version";
import type { BotConfig } from "../config";
import { formatError } from "../helper/formatError";

async function sendStartupNotice(client: Client, config: BotConfig): Promise<void> {
  if (!config.startupChannelId) return;
  try {
    const channel = await client.channels.fetch(config.startupChannelId);
    if (!channel || !channel.isSendable()) {
      console.warn(`[ready] startup channel not sendable id=${config.startupChannelId}`);
      return;
    }
    await channel.send(renderStartupNotice(config.version));
    console.info(`[ready] startup notice sent channel=${config.startupChannelId}`);
  } catch (err) {
    console.warn(`[ready] startup notice failed error=${formatError(err)}`);
  }
}

export default (client: Client, config: BotConfig): void => {
  client.once("ready", async () => {
    if (!client.user || !client.application) {
      return;
    }

    try {
      await client.application.commands.set(Commands);
      console.info(`[ready] ${Commands.length} discord bot commands registered`);
    } catch (err) {
      console.error(`[ready] command registration failed error=${formatError(err)}`);
    }

    await sendStartupNotice(client, config);
    console.info(`[ready] River Scout is online as ${client.user.tag} clan=#${config.clanTag}`);
  });
};
