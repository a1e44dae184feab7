import { normalizeTag } from "./domain/tag";
import { resolveTimeZone } from "./domain/time";

const DEFAULT_API_URL = "https://api.clashroyale.com/v1";
const DEFAULT_FRESH_ATTEMPTS = 2;
const DEFAULT_TIMEOUT_SECONDS = 15;
const DEFAULT_DONATIONS_LIMIT = 10;
const DEFAULT_WAR_HISTORY_LIMIT = 50;
const DEFAULT_INACTIVE_LIMIT = 10;
const DEFAULT_SPY_LOG_LIMIT = 80;
const DEFAULT_SPY_HISTORY_WEEKS = 20;
const DEFAULT_TIME_ZONE = "Europe/Zurich";
const DEFAULT_MAX_MESSAGE_LENGTH = 2000;

export type VersionInfo = {
  sha: string;
  ref: string;
  time: string;
  author: string;
  message: string;
};

export type BotConfig = {
  discordToken: string;
  clashToken: string;
  clanTag: string;
  apiBaseUrl: string;
  freshAttempts: number;
  apiTimeoutMs: number;
  donationsLimit: number;
  warHistoryLimit: number;
  inactiveLimit: number;
  spyLogLimit: number;
  spyHistoryWeeks: number;
  timeZone: string;
  maxMessageLength: number;
  startupChannelId: string | null;
  version: VersionInfo;
};

export class ConfigError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(", ")}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback = ""): string {
  return (env[key] ?? "").trim() || fallback;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = Number(env[key] ?? fallback);
  return Number.isFinite(raw) && raw > 0 ? Math.trunc(raw) : fallback;
}

/** Build the bot configuration once at start-up; unset or invalid optional values fall back to defaults. */
export function loadConfig(env: Env = process.env): BotConfig {
  const discordToken = readString(env, "DISCORD_TOKEN");
  const clashToken = readString(env, "CLASH_ROYALE_TOKEN");
  const clanTag = normalizeTag(env.CLAN_TAG);

  const missing = [
    !discordToken ? "DISCORD_TOKEN" : null,
    !clashToken ? "CLASH_ROYALE_TOKEN" : null,
    !clanTag ? "CLAN_TAG" : null,
  ].filter((key): key is string => key !== null);
  if (missing.length > 0) throw new ConfigError(missing);

  return Object.freeze({
    discordToken,
    clashToken,
    clanTag,
    apiBaseUrl: readString(env, "CLASH_ROYALE_API_URL", DEFAULT_API_URL).replace(/\/+$/, ""),
    freshAttempts: readPositiveInt(env, "FRESH_FETCH_ATTEMPTS", DEFAULT_FRESH_ATTEMPTS),
    apiTimeoutMs: readPositiveInt(env, "API_TIMEOUT_SECONDS", DEFAULT_TIMEOUT_SECONDS) * 1000,
    donationsLimit: readPositiveInt(env, "DONATIONS_LIMIT", DEFAULT_DONATIONS_LIMIT),
    warHistoryLimit: readPositiveInt(env, "WAR_HISTORY_LIMIT", DEFAULT_WAR_HISTORY_LIMIT),
    inactiveLimit: readPositiveInt(env, "INACTIVE_LIMIT", DEFAULT_INACTIVE_LIMIT),
    spyLogLimit: readPositiveInt(env, "SPY_LOG_LIMIT", DEFAULT_SPY_LOG_LIMIT),
    spyHistoryWeeks: readPositiveInt(env, "SPY_HISTORY_WEEKS", DEFAULT_SPY_HISTORY_WEEKS),
    timeZone: resolveTimeZone(readString(env, "BOT_TZ", DEFAULT_TIME_ZONE)),
    maxMessageLength: DEFAULT_MAX_MESSAGE_LENGTH,
    startupChannelId: readString(env, "STARTUP_CHANNEL_ID") || null,
    version: Object.freeze({
      sha: readString(env, "BOT_VERSION_SHA", "dev"),
      ref: readString(env, "BOT_VERSION_REF", "local"),
      time: readString(env, "BOT_VERSION_TIME", "unknown"),
      author: readString(env, "BOT_VERSION_AUTHOR", "unknown"),
      message: readString(env, "BOT_VERSION_MSG"),
    }),
  });
}
