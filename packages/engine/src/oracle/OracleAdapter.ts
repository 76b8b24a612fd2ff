// ============================================
// Price Oracle Adapter (staleness-checked reads)
// ============================================

import type { Address } from "viem";
import { createLogger, DEFAULT_ORACLE_TIMEOUT_SECONDS } from "@pegmint/common";
import { EngineError, tokenNotAllowed } from "../errors.js";
import type { PriceFeed, RoundData } from "../interfaces.js";

const logger = createLogger("engine:oracle");

export interface PriceReading {
  /** USD price, 8 decimals. Sign is not checked here. */
  price: bigint;
  /** Unix seconds of the round's last update. */
  updatedAt: bigint;
}

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export class OracleAdapter {
  constructor(
    private readonly feeds: ReadonlyMap<Address, PriceFeed>,
    readonly timeoutSeconds: number = DEFAULT_ORACLE_TIMEOUT_SECONDS,
    private readonly now: Clock = systemClock
  ) {}

  feedFor(asset: Address): PriceFeed {
    const feed = this.feeds.get(asset);
    if (!feed) throw tokenNotAllowed(asset);
    return feed;
  }

  /**
   * Latest price for `asset`. Rejects a round that was never completed, that
   * was carried over from an earlier round, or that is older than the timeout.
   */
  async latestPrice(asset: Address): Promise<PriceReading> {
    const feed = this.feedFor(asset);

    const round = await this.readRound(asset, feed);
    const { roundId, answer, updatedAt, answeredInRound } = round;
    const secondsSince = BigInt(this.now()) - updatedAt;

    if (updatedAt === 0n || answeredInRound < roundId || secondsSince > BigInt(this.timeoutSeconds)) {
      logger.warn("Stale price rejected", {
        asset,
        feed: feed.address,
        roundId,
        answeredInRound,
        updatedAt,
        secondsSince,
      });
      throw new EngineError("STALE_PRICE", `Price for ${asset} is stale`, {
        asset,
        updatedAt,
        secondsSince,
        timeoutSeconds: this.timeoutSeconds,
      });
    }

    return { price: answer, updatedAt };
  }

  private async readRound(asset: Address, feed: PriceFeed): Promise<RoundData> {
    try {
      return await feed.latestRoundData();
    } catch (err) {
      throw new EngineError(
        "ORACLE_UNAVAILABLE",
        `Price feed ${feed.address} for ${asset} could not be read`,
        { asset, feed: feed.address },
        { cause: err }
      );
    }
  }
}
