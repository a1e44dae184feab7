import { describe, expect, it, vi } from "vitest";
import {
  daysSince,
  firstRoyaleTime,
  formatAgo,
  formatClock,
  formatDate,
  localHour,
  parseRoyaleTime,
} from "../src/domain/time";

describe("parseRoyaleTime", () => {
  it("parses the upstream timestamp format with and without milliseconds", () => {
    expect(parseRoyaleTime("20240105T093000.000Z")?.getTime()).toBe(Date.UTC(2024, 0, 5, 9, 30, 0));
    expect(parseRoyaleTime("20240105T093000Z")?.getTime()).toBe(Date.UTC(2024, 0, 5, 9, 30, 0));
  });

  it("returns null for anything else", () => {
    expect(parseRoyaleTime("2024-01-05T09:30:00Z")).toBeNull();
    expect(parseRoyaleTime("")).toBeNull();
    expect(parseRoyaleTime(null)).toBeNull();
  });

  it("takes the first parseable candidate", () => {
    expect(firstRoyaleTime(null, "garbage", "20240105T093000.000Z")?.getTime()).toBe(
      Date.UTC(2024, 0, 5, 9, 30, 0)
    );
    expect(firstRoyaleTime(undefined, null)).toBeNull();
  });
});

describe("zoned formatting", () => {
  it("reads the wall-clock hour in the configured zone", () => {
    const at = new Date(Date.UTC(2024, 0, 15, 16, 0, 0));
    expect(localHour(at, "Europe/Zurich")).toBe(17);
    expect(localHour(at, "UTC")).toBe(16);
  });

  it("falls back to UTC for an unknown zone without logging per call", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    try {
      const at = new Date(Date.UTC(2024, 0, 15, 16, 0, 0));
      expect(localHour(at, "Not/AZone")).toBe(16);
      expect(formatDate(at, "Not/AZone")).toBe("15.01.2024");
      expect(warn).not.toHaveBeenCalled();
    } finally {
      warn.mockRestore();
    }
  });

  it("formats dates and clock times in the zone", () => {
    const at = new Date(Date.UTC(2024, 0, 5, 23, 30, 5));
    expect(formatDate(at, "Europe/Zurich")).toBe("06.01.2024");
    expect(formatDate(null, "UTC")).toBe("unknown");
    expect(formatClock(at, "UTC")).toBe("23:30:05");
  });
});

describe("relative ages", () => {
  const now = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));
  const ago = (ms: number) => new Date(now.getTime() - ms);

  it("picks the unit by age", () => {
    expect(formatAgo(ago(30 * 1000), now, "UTC")).toBe("1m ago");
    expect(formatAgo(ago(45 * 60 * 1000), now, "UTC")).toBe("45m ago");
    expect(formatAgo(ago(3 * 3600 * 1000), now, "UTC")).toBe("3h ago");
    expect(formatAgo(ago(5 * 86400 * 1000), now, "UTC")).toBe("5d ago");
    expect(formatAgo(ago(40 * 86400 * 1000), now, "UTC")).toBe("5w ago");
    expect(formatAgo(ago(100 * 86400 * 1000), now, "UTC")).toBe("on 22.02.2024");
    expect(formatAgo(null, now, "UTC")).toBe("unknown");
  });

  it("counts fractional days offline", () => {
    expect(daysSince(ago(36 * 3600 * 1000), now)).toBe(1.5);
    expect(daysSince(null, now)).toBe(0);
  });
});
