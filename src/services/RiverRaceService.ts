import type { BotConfig } from "../config";
import { type CurrentRiverRace, MAX_DECKS_PER_DAY, findOwnRiverClan } from "../domain/royale";
import { localHour } from "../domain/time";
import { recordFetchEvent } from "../helper/fetchTelemetry";
import type { ClashRoyaleService } from "./ClashRoyaleService";

export const STALE_UNTOUCHED_SHARE = 0.7;
export const STALE_FROM_HOUR = 17;

/**
 * Heuristic for a cached pre-reset payload: from 17:00 local time on, 70% or more
 * of the own clan showing all decks of the day unused is implausible.
 */
export function looksStale(
  race: CurrentRiverRace,
  ownTag: string,
  hour: number,
  maxDecks = MAX_DECKS_PER_DAY
): boolean {
  const participants = findOwnRiverClan(race, ownTag)?.participants ?? [];
  if (participants.length === 0) return false;

  const untouched = participants.filter(
    (p) => Math.max(maxDecks - p.decksUsedToday, 0) === maxDecks
  ).length;
  return untouched / participants.length >= STALE_UNTOUCHED_SHARE && hour >= STALE_FROM_HOUR;
}

type FetcherConfig = Pick<BotConfig, "freshAttempts" | "timeZone">;

export class RiverRaceService {
  constructor(
    private readonly royale: ClashRoyaleService,
    private readonly config: FetcherConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** True when the payload of the configured clan looks like a cached snapshot right now. */
  isStale(race: CurrentRiverRace): boolean {
    return looksStale(race, this.royale.clanTag, localHour(this.now(), this.config.timeZone));
  }

  /**
   * Current race of the configured clan, refetched while it looks stale:
   * once more with `attempts >= 2`, a third time with `attempts >= 3`.
   * The last payload is returned even when it still looks stale.
   */
  async getCurrentRiverFresh(attempts = this.config.freshAttempts): Promise<CurrentRiverRace> {
    let race = await this.royale.getCurrentRiverRace(undefined, true);
    if (attempts <= 1) return race;

    if (this.isStale(race)) {
      recordFetchEvent({ namespace: "clashroyale", operation: "getCurrentRiverRace", source: "refetch" });
      race = await this.royale.getCurrentRiverRace(undefined, true);
      if (attempts >= 3 && this.isStale(race)) {
        recordFetchEvent({ namespace: "clashroyale", operation: "getCurrentRiverRace", source: "refetch" });
        race = await this.royale.getCurrentRiverRace(undefined, true);
      }
      if (this.isStale(race)) {
        console.warn(`[river] payload still looks stale after refetch clan=${this.royale.clanTag}`);
      }
    }
    return race;
  }
}
