import { Client, IntentsBitField } from "discord.js";
import dotenv from "dotenv";
import { loadConfig } from "./config";
import { formatError } from "./helper/formatError";
import interactionCreate from "./listeners/interactionCreate";
import ready from "./listeners/ready";
import { ClashRoyaleService } from "./services/ClashRoyaleService";
import { RiverRaceService } from "./services/RiverRaceService";
import { SpyService } from "./services/SpyService";

dotenv.config();

console.info("River Scout is starting...");

const config = loadConfig();
const royale = new ClashRoyaleService(config);
const river = new RiverRaceService(royale, config);
const spy = new SpyService(royale, river, config);

const discordClient = new Client({
  intents: [IntentsBitField.Flags.Guilds],
});

ready(discordClient, config);
interactionCreate(discordClient, {
  config,
  royale,
  river,
  spy,
  now: () => new Date(),
});

discordClient.login(config.discordToken).catch((err) => {
  console.error(`[startup] discord login failed error=${formatError(err)}`);
  process.exitCode = 1;
});
