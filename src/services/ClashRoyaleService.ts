import axios, { type AxiosInstance } from "axios";
import type { BotConfig } from "../config";
import {
  type ClanMember,
  type ClanSummary,
  type CurrentRiverRace,
  type RiverLog,
  parseClanSummary,
  parseCurrentRiverRace,
  parseMembers,
  parseRiverLog,
} from "../domain/royale";
import { encodeTagForPath, normalizeTag } from "../domain/tag";
import { recordFetchEvent } from "../helper/fetchTelemetry";
import {
  ClanNotFoundError,
  InvalidCredentialsError,
  RateLimitedError,
  UpstreamError,
  UpstreamTimeoutError,
} from "./UpstreamErrors";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

type GatewayConfig = Pick<BotConfig, "clashToken" | "clanTag" | "apiBaseUrl" | "apiTimeoutMs">;

/** Read-only client for the Clash Royale clan endpoints. Never retries. */
export class ClashRoyaleService {
  private lastBustMs = 0;

  constructor(
    private readonly config: GatewayConfig,
    private readonly http: AxiosInstance = axios.create(),
    private readonly clock: () => number = Date.now
  ) {}

  get clanTag(): string {
    return this.config.clanTag;
  }

  /** Authenticated GET of `path` below the API base URL. */
  async get(path: string, cacheBust = false, operation = "get"): Promise<unknown> {
    const params: Record<string, number> = {};
    if (cacheBust) {
      this.lastBustMs = Math.max(this.clock(), this.lastBustMs + 1);
      params.ts = this.lastBustMs;
    }

    try {
      const response = await this.http.get<unknown>(`${this.config.apiBaseUrl}${path}`, {
        timeout: this.config.apiTimeoutMs,
        params,
        headers: {
          Authorization: `Bearer ${this.config.clashToken}`,
          Accept: "application/json",
          "Cache-Control": "no-store, max-age=0",
          Pragma: "no-cache",
        },
      });
      return response.data;
    } catch (err) {
      throw this.toUpstreamError(err, path);
    } finally {
      recordFetchEvent({ namespace: "clashroyale", operation, source: "api", detail: `path=${path}` });
    }
  }

  private toUpstreamError(err: unknown, path: string): UpstreamError {
    if (!axios.isAxiosError(err)) {
      return new UpstreamError(err instanceof Error ? err.message : String(err), null, path);
    }
    if (err.code && TIMEOUT_CODES.has(err.code)) {
      return new UpstreamTimeoutError(path, this.config.apiTimeoutMs);
    }
    const status = err.response?.status ?? null;
    if (status === 404) return new ClanNotFoundError(path);
    if (status === 403) return new InvalidCredentialsError(path);
    if (status === 429) return new RateLimitedError(path);
    return new UpstreamError(
      status === null ? `Upstream transport failure: ${err.message}` : `Upstream answered HTTP ${status}`,
      status,
      path
    );
  }

  private clanPath(tag: string | undefined, suffix = ""): string {
    return `/clans/${encodeTagForPath(normalizeTag(tag ?? this.config.clanTag))}${suffix}`;
  }

  async getClan(tag?: string): Promise<ClanSummary> {
    return parseClanSummary(await this.get(this.clanPath(tag), false, "getClan"));
  }

  async getMembers(tag?: string): Promise<ClanMember[]> {
    return parseMembers(await this.get(this.clanPath(tag, "/members"), false, "getMembers"));
  }

  async getCurrentRiverRace(tag?: string, cacheBust = true): Promise<CurrentRiverRace> {
    return parseCurrentRiverRace(
      await this.get(this.clanPath(tag, "/currentriverrace"), cacheBust, "getCurrentRiverRace")
    );
  }

  async getRiverLog(tag: string | undefined, limit: number): Promise<RiverLog> {
    return parseRiverLog(
      await this.get(this.clanPath(tag, `/riverracelog?limit=${limit}`), true, "getRiverLog")
    );
  }
}
