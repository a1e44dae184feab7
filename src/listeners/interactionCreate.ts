import type { ChatInputCommandInteraction, Client, Interaction } from "discord.js";
import type { Command, CommandContext } from "../Command";
import { Commands } from "../Commands";
import { readArgs } from "../helper/commandArgs";
import { runFetchTelemetryBatch } from "../helper/fetchTelemetry";
import { formatError } from "../helper/formatError";
import { ReplyChannel } from "../helper/safeReply";
import { userMessageForError } from "../services/UpstreamErrors";

export type CommandServices = Omit<CommandContext, "send">;

/** Run `command` and hand its text to `channel`; failures become one user-facing line. */
export async function runCommand(
  command: Command,
  args: string[],
  services: CommandServices,
  channel: Pick<ReplyChannel, "send" | "deliver">
): Promise<void> {
  try {
    const result = await runFetchTelemetryBatch(`command:${command.name}`, () =>
      command.build(args, { ...services, send: (content) => channel.send(content) })
    );
    await channel.deliver(result);
  } catch (err) {
    console.error(`[${command.name}] failed args=${JSON.stringify(args)} error=${formatError(err)}`);
    await channel.send(`❌ ${userMessageForError(err)}`);
  }
}

const handleSlashCommand = async (
  interaction: ChatInputCommandInteraction,
  services: CommandServices
): Promise<void> => {
  const command = Commands.find((c) => c.name === interaction.commandName);
  const channel = new ReplyChannel(interaction);
  if (!command) {
    await channel.send("Unknown command.");
    return;
  }

  await interaction.deferReply();
  await runCommand(command, readArgs(interaction, command), services, channel);
};

export default (client: Client, services: CommandServices): void => {
  client.on("interactionCreate", async (interaction: Interaction) => {
    if (!interaction.isChatInputCommand()) return;
    try {
      await handleSlashCommand(interaction, services);
    } catch (err) {
      console.error(`[interaction] command=${interaction.commandName} error=${formatError(err)}`);
    }
  });
};
