import { describe, expect, it, vi } from "vitest";
import { bestEffort, valueOrFallback } from "../src/helper/bestEffort";
import { progressBar, rankLabel } from "../src/helper/discordContent";
import { getFetchTotals, recordFetchEvent, runFetchTelemetryBatch } from "../src/helper/fetchTelemetry";
import { ReplyChannel } from "../src/helper/safeReply";

function fakeInteraction(deferred: boolean) {
  const calls: string[] = [];
  const interaction = {
    deferred,
    replied: false,
    editReply: vi.fn(async (payload: { content: string }) => {
      calls.push(`edit:${payload.content}`);
    }),
    reply: vi.fn(async (payload: { content: string }) => {
      calls.push(`reply:${payload.content}`);
    }),
    followUp: vi.fn(async (payload: { content: string }) => {
      calls.push(`follow:${payload.content}`);
    }),
  };
  return { interaction, calls };
}

describe("ReplyChannel", () => {
  it("fills the deferred reply first and follows up after", async () => {
    const { interaction, calls } = fakeInteraction(true);
    const channel = new ReplyChannel(interaction as never);
    await channel.deliver(["one", "two"]);
    await channel.deliver(null);
    expect(calls).toEqual(["edit:one", "follow:two"]);
  });

  it("replies directly when nothing was deferred", async () => {
    const { interaction, calls } = fakeInteraction(false);
    await new ReplyChannel(interaction as never).deliver("hi");
    expect(calls).toEqual(["reply:hi"]);
  });

  it("cuts long messages and ignores an expired interaction", async () => {
    const { interaction, calls } = fakeInteraction(true);
    interaction.editReply.mockRejectedValueOnce(Object.assign(new Error("Unknown interaction"), { code: 10062 }));
    const channel = new ReplyChannel(interaction as never);
    await channel.send("x");
    await channel.send("y".repeat(2100));
    expect(calls).toEqual([`edit:${"y".repeat(2000)}`]);
  });
});

describe("bestEffort", () => {
  it("passes values through", async () => {
    const result = await bestEffort("ok", async () => 5, 0);
    expect(result).toEqual({ ok: true, value: 5 });
    expect(valueOrFallback(result)).toBe(5);
  });

  it("reports the fallback and the error", async () => {
    const error = new Error("down");
    const result = await bestEffort("test:down", async (): Promise<number> => {
      throw error;
    }, 7);
    expect(result).toEqual({ ok: false, fallback: 7, error });
    expect(valueOrFallback(result)).toBe(7);
    expect(getFetchTotals("best-effort", "test:down").fallback).toBe(1);
  });
});

describe("bestEffort telemetry", () => {
  it("counts fallbacks under one operation whatever the detail", async () => {
    const failing = async (): Promise<number> => {
      throw new Error("down");
    };
    await bestEffort("test:enrich", failing, 0, "tag=AAA");
    await bestEffort("test:enrich", failing, 0, "tag=BBB");
    expect(getFetchTotals("best-effort", "test:enrich").fallback).toBe(2);
    expect(getFetchTotals("best-effort", "test:enrich tag=AAA").fallback).toBe(0);
  });
});

describe("fetch telemetry", () => {
  it("counts events inside and outside batches", async () => {
    recordFetchEvent({ namespace: "test", operation: "count", source: "api" });
    const value = await runFetchTelemetryBatch("job", async () => {
      recordFetchEvent({ namespace: "test", operation: "count", source: "refetch" });
      return 42;
    });
    expect(value).toBe(42);
    expect(getFetchTotals("test", "count")).toEqual({ api: 1, refetch: 1, fallback: 0 });
  });
});

describe("discord content helpers", () => {
  it("formats ranks and bars", () => {
    expect(rankLabel(0)).toBe(" 1.");
    expect(rankLabel(11)).toBe("12.");
    expect(progressBar(0.25, 4)).toBe("█░░░");
    expect(progressBar(Number.NaN, 3)).toBe("░░░");
  });
});
