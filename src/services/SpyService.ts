import type { BotConfig } from "../config";
import { type OpponentWeek, analyzeOpponentHistory, pickOpponent } from "../domain/opponent";
import { type BestEffort, bestEffort, valueOrFallback } from "../helper/bestEffort";
import { renderOpponentHistory, renderSpyDetails, renderSpySummary } from "../reports/spy";
import type { ClashRoyaleService } from "./ClashRoyaleService";
import type { RiverRaceService } from "./RiverRaceService";

type SpyConfig = Pick<BotConfig, "clanTag" | "spyLogLimit" | "spyHistoryWeeks" | "maxMessageLength">;

export const NO_OPPONENTS_MESSAGE = "No opponents found in the current river race.";

export class SpyService {
  constructor(
    private readonly royale: ClashRoyaleService,
    private readonly river: RiverRaceService,
    private readonly config: SpyConfig
  ) {}

  /** Member count of the opponent's clan profile; participant count when the profile cannot be read. */
  async fetchMemberCount(tag: string, fallback: number): Promise<BestEffort<number>> {
    return bestEffort(
      "spy:clan-size",
      async () => (await this.royale.getClan(tag)).memberCount,
      fallback,
      `tag=${tag}`
    );
  }

  async fetchHistory(tag: string): Promise<BestEffort<OpponentWeek[], null>> {
    return bestEffort(
      "spy:history",
      async () =>
        analyzeOpponentHistory(
          tag,
          await this.royale.getRiverLog(tag, this.config.spyLogLimit),
          this.config.spyHistoryWeeks
        ),
      null,
      `tag=${tag}`
    );
  }

  /** Summary, history and current details of the most active opponent. */
  async scout(): Promise<string[]> {
    const race = await this.river.getCurrentRiverFresh();
    const opponent = pickOpponent(race, this.config.clanTag);
    if (!opponent) return [NO_OPPONENTS_MESSAGE];

    const limit = this.config.maxMessageLength;
    const members = valueOrFallback(await this.fetchMemberCount(opponent.tag, opponent.participants));
    const messages = [renderSpySummary(opponent, members, limit)];

    const history = await this.fetchHistory(opponent.tag);
    if (!history.ok) {
      messages.push("⚠️ History could not be loaded right now.");
    } else if (history.value.length === 0) {
      messages.push(`⚠️ No history found for ${opponent.name} (#${opponent.tag}).`);
    } else {
      messages.push(renderOpponentHistory(opponent, history.value, limit));
    }
    console.info(
      `[spy] opponent=${opponent.tag} score=${opponent.activityScore} weeks=${history.ok ? history.value.length : "n/a"}`
    );

    messages.push(renderSpyDetails(opponent, limit));
    return messages;
  }
}
