import { describe, expect, it } from "vitest";
import { aggregateKey, aggregateWarHistory, findHistoryMatches } from "../src/domain/warHistory";
import { logEntry, participant, riverClan, riverLog } from "./fixtures";

const d1 = new Date(Date.UTC(2024, 0, 8, 10, 0, 0));
const d2 = new Date(Date.UTC(2024, 0, 15, 10, 0, 0));
const d3 = new Date(Date.UTC(2024, 0, 22, 10, 0, 0));

const log = riverLog(
  logEntry(d2, [
    riverClan({ tag: "X1", name: "Other" }),
    riverClan({
      participants: [
        participant({ tag: "A1", name: "Alice", fame: 50, decksUsed: 4, boatAttacks: 1, repairPoints: 10 }),
      ],
    }),
  ]),
  logEntry(d3, [riverClan({ tag: "X1", participants: [participant({ tag: "A1", name: "Alice", fame: 999 })] })]),
  logEntry(d1, [
    riverClan({
      participants: [
        participant({ tag: "#a1", name: "Ali", fame: 100, decksUsed: 12 }),
        participant({ tag: "", name: "Ghost", fame: 30, decksUsed: 2 }),
      ],
    }),
  ])
);

describe("aggregateWarHistory", () => {
  it("sums only the periods the own clan took part in", () => {
    const history = aggregateWarHistory(log, "#own1");
    const alice = history.get("A1");

    expect(alice).toEqual({
      name: "Ali",
      fame: 150,
      repairPoints: 10,
      decksUsed: 16,
      boatAttacks: 1,
      wars: 2,
      firstSeen: d1,
      lastSeen: d2,
    });
  });

  it("keys tagless players by name", () => {
    const history = aggregateWarHistory(log, "OWN1");
    expect([...history.keys()]).toEqual(["A1", "NON-Ghost"]);
    expect(history.get("NON-Ghost")).toMatchObject({ fame: 30, wars: 1 });
  });

  it("gives the same result for the same log", () => {
    expect(aggregateWarHistory(log, "OWN1")).toEqual(aggregateWarHistory(log, "OWN1"));
  });

  it("keeps the last non-empty name", () => {
    const renamed = riverLog(
      logEntry(d1, [riverClan({ participants: [participant({ tag: "B1", name: "Bob" })] })]),
      logEntry(d2, [riverClan({ participants: [participant({ tag: "B1", name: "" })] })])
    );
    expect(aggregateWarHistory(renamed, "OWN1").get("B1")?.name).toBe("Bob");
  });

  it("is empty for an empty log", () => {
    expect(aggregateWarHistory(riverLog(), "OWN1").size).toBe(0);
  });

  it("builds fallback keys", () => {
    expect(aggregateKey("#b2", "Bob")).toBe("B2");
    expect(aggregateKey("", "")).toBe("NON-?");
  });
});

describe("findHistoryMatches", () => {
  const history = aggregateWarHistory(
    riverLog(
      logEntry(d1, [
        riverClan({
          participants: [
            participant({ tag: "T1", name: "Max" }),
            participant({ tag: "T2", name: "Maxine" }),
            participant({ tag: "T3", name: "Tom" }),
          ],
        }),
      ])
    ),
    "OWN1"
  );

  it("prefers an exact name match", () => {
    expect(findHistoryMatches(history, "max").map((m) => m.key)).toEqual(["T1"]);
  });

  it("falls back to name substrings", () => {
    expect(findHistoryMatches(history, "ax").map((m) => m.key)).toEqual(["T1", "T2"]);
  });

  it("falls back to the tag", () => {
    expect(findHistoryMatches(history, "#t3").map((m) => m.aggregate.name)).toEqual(["Tom"]);
    expect(findHistoryMatches(history, "nobody")).toEqual([]);
    expect(findHistoryMatches(history, "  ")).toEqual([]);
  });
});
