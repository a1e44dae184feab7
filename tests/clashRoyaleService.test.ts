import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { ClashRoyaleService } from "../src/services/ClashRoyaleService";
import {
  ClanNotFoundError,
  InvalidCredentialsError,
  RateLimitedError,
  UpstreamError,
  UpstreamTimeoutError,
} from "../src/services/UpstreamErrors";

type Handler = (config: InternalAxiosRequestConfig) => AxiosResponse;

function ok(config: InternalAxiosRequestConfig, data: unknown): AxiosResponse {
  return { data, status: 200, statusText: "OK", headers: {}, config };
}

function failWith(status: number): Handler {
  return (config) => {
    throw new AxiosError(`HTTP ${status}`, "ERR_BAD_REQUEST", config, null, {
      data: { reason: "x" },
      status,
      statusText: "",
      headers: {},
      config,
    });
  };
}

function makeService(handler: Handler, clock: () => number = () => 1000) {
  const seen: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      seen.push(config);
      return handler(config);
    },
  });
  const service = new ClashRoyaleService(
    { clashToken: "test-secret", clanTag: "OWN1", apiBaseUrl: "https://api.test/v1", apiTimeoutMs: 500 },
    http,
    clock
  );
  return { service, seen };
}

describe("ClashRoyaleService requests", () => {
  it("sends the bearer token and no-cache headers", async () => {
    const { service, seen } = makeService((config) => ok(config, { tag: "#OWN1", name: "Own", members: 12 }));
    const clan = await service.getClan();

    expect(clan).toMatchObject({ tag: "OWN1", name: "Own", memberCount: 12 });
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe("https://api.test/v1/clans/%23OWN1");
    expect(seen[0].timeout).toBe(500);
    expect(seen[0].headers.get("Authorization")).toBe("Bearer test-secret");
    expect(seen[0].headers.get("Cache-Control")).toBe("no-store, max-age=0");
    expect(seen[0].headers.get("Pragma")).toBe("no-cache");
    expect(seen[0].params).toEqual({});
  });

  it("adds a strictly increasing cache-bust parameter to river race calls", async () => {
    const { service, seen } = makeService((config) => ok(config, { state: "full", clans: [] }));
    await service.getCurrentRiverRace();
    await service.getCurrentRiverRace();

    expect(seen[0].url).toBe("https://api.test/v1/clans/%23OWN1/currentriverrace");
    expect(seen[0].params).toEqual({ ts: 1000 });
    expect(seen[1].params).toEqual({ ts: 1001 });
  });

  it("encodes an explicit tag and the log limit", async () => {
    const { service, seen } = makeService((config) => ok(config, { items: [] }));
    const log = await service.getRiverLog("#abc", 5);

    expect(log.items).toEqual([]);
    expect(seen[0].url).toBe("https://api.test/v1/clans/%23ABC/riverracelog?limit=5");
  });

  it("parses members and the race payload", async () => {
    const { service } = makeService((config) =>
      config.url?.endsWith("/members")
        ? ok(config, {
            items: [
              { tag: "#m1", name: "Ann", role: "elder", trophies: 6100, clanRank: 2, donations: 40, lastSeen: "20240105T093000.000Z" },
            ],
          })
        : ok(config, {
            state: "warDay",
            periodIndex: "7",
            clan: { tag: "#OWN1", name: "Own", points: 900, participants: [{ tag: "#m1", decksUsedToday: 3 }] },
          })
    );

    const members = await service.getMembers();
    expect(members[0]).toMatchObject({ tag: "M1", role: "elder", donations: 40, donationsReceived: 0 });
    expect(members[0].lastSeen?.getTime()).toBe(Date.UTC(2024, 0, 5, 9, 30, 0));

    const race = await service.getCurrentRiverRace();
    expect(race.periodIndex).toBe(7);
    expect(race.clan?.fame).toBe(900);
    expect(race.clan?.participants[0]).toMatchObject({ tag: "M1", name: "", decksUsedToday: 3, decksUsed: 0 });
    expect(race.clans).toEqual([]);
  });
});

describe("ClashRoyaleService errors", () => {
  it.each([
    [404, ClanNotFoundError],
    [403, InvalidCredentialsError],
    [429, RateLimitedError],
  ])("maps HTTP %i to its own error", async (status, ErrorType) => {
    const { service } = makeService(failWith(status));
    const err = await service.getClan().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ErrorType);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ status, path: "/clans/%23OWN1" });
  });

  it("keeps the status of other failures", async () => {
    const { service } = makeService(failWith(503));
    const err = await service.getMembers().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).not.toBeInstanceOf(ClanNotFoundError);
    expect(err).toMatchObject({ status: 503, message: "Upstream answered HTTP 503" });
  });

  it("maps a client timeout to a timeout error", async () => {
    const { service } = makeService((config) => {
      throw new AxiosError("timeout of 500ms exceeded", "ECONNABORTED", config);
    });
    const err = await service.getCurrentRiverRace().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamTimeoutError);
    expect(err).toMatchObject({ status: null });
  });

  it("does not retry on its own", async () => {
    const { service, seen } = makeService(failWith(500));
    await expect(service.getClan()).rejects.toBeInstanceOf(UpstreamError);
    expect(seen).toHaveLength(1);
  });
});
