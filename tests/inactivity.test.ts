import { describe, expect, it } from "vitest";
import { criterionValue, isInactivityCriterion, scorePlayers } from "../src/domain/inactivity";
import type { PlayerAggregate } from "../src/domain/warHistory";
import { member, participant, race, riverClan } from "./fixtures";

const now = new Date(Date.UTC(2024, 5, 10, 12, 0, 0));
const twoDaysAgo = new Date(now.getTime() - 2 * 86400 * 1000);

function aggregate(overrides: Partial<PlayerAggregate>): PlayerAggregate {
  return {
    name: "x",
    fame: 0,
    repairPoints: 0,
    decksUsed: 0,
    boatAttacks: 0,
    wars: 0,
    firstSeen: null,
    lastSeen: null,
    ...overrides,
  };
}

const current = race(
  riverClan({
    participants: [
      participant({ tag: "P1", fame: 500, decksUsed: 6 }),
      participant({ tag: "P2", fame: 1000, decksUsed: 8 }),
    ],
  })
);

describe("scorePlayers", () => {
  it("uses default expectations without history", () => {
    const [score] = scorePlayers(
      [member({ tag: "P1", donations: 100, trophies: 6000, clanRank: 1, lastSeen: twoDaysAgo })],
      current,
      "OWN1",
      { now }
    );

    expect(score.warAttackScore).toBe(200);
    expect(score.warPointsScore).toBe(300);
    expect(score.donationScore).toBe(900);
    expect(score.trophyScore).toBe(410);
    expect(score.daysOffline).toBe(2);
    expect(score.totalScore).toBeCloseTo(370.5, 6);
  });

  it("uses the per-war history averages as expectations", () => {
    const history = new Map([
      ["P1", aggregate({ wars: 2, decksUsed: 20, fame: 3000 })],
      ["P2", aggregate({ wars: 2, decksUsed: 4, fame: 6000 })],
    ]);
    const scores = scorePlayers([member({ tag: "P1" }), member({ tag: "P2" })], current, "OWN1", {
      history,
      now,
    });
    const byTag = new Map(scores.map((s) => [s.tag, s]));

    expect(byTag.get("P1")?.warAttackScore).toBe(200);
    expect(byTag.get("P1")?.warPointsScore).toBe(1000);
    expect(byTag.get("P2")?.warAttackScore).toBe(-400);
    expect(byTag.get("P2")?.warPointsScore).toBe(1000);
  });

  it("ignores history entries without wars", () => {
    const history = new Map([["P1", aggregate({ wars: 0, decksUsed: 40, fame: 9000 })]]);
    const [score] = scorePlayers([member({ tag: "P1" })], current, "OWN1", { history, now });
    expect(score.warAttackScore).toBe(200);
    expect(score.warPointsScore).toBe(300);
  });

  it("treats members outside the race as idle", () => {
    const [score] = scorePlayers([member({ tag: "Z9" })], current, "OWN1", { now });
    expect(score).toMatchObject({ fame: 0, decksUsed: 0, warAttackScore: 800, warPointsScore: 800, daysOffline: 0 });
  });

  it("sorts by the chosen criterion, keeping roster order on ties", () => {
    const members = [
      member({ tag: "A", donations: 50 }),
      member({ tag: "B", donations: 0 }),
      member({ tag: "C", donations: 50 }),
    ];
    const scores = scorePlayers(members, current, "OWN1", { criterion: "donations", now });
    expect(scores.map((s) => s.tag)).toEqual(["B", "A", "C"]);
    expect(scores.map((s) => criterionValue(s, "donations"))).toEqual([1000, 950, 950]);
  });

  it("is empty without members", () => {
    expect(scorePlayers([], current, "OWN1", { now })).toEqual([]);
  });
});

describe("isInactivityCriterion", () => {
  it("accepts the known criteria only", () => {
    expect(isInactivityCriterion("war-points")).toBe(true);
    expect(isInactivityCriterion("fame")).toBe(false);
  });
});
