// ============================================
// Chainlink Aggregator Price Feed
// ============================================

import type { Address, PublicClient } from "viem";
import { createLogger } from "@pegmint/common";
import { toAddress, type PriceFeed, type RoundData } from "@pegmint/engine";
import { AGGREGATOR_V3_ABI } from "./abis.js";

const logger = createLogger("adapters:chainlink");

/** Reads rounds from an AggregatorV3 contract. Staleness is judged by the engine. */
export class ChainlinkPriceFeed implements PriceFeed {
  readonly address: Address;

  constructor(
    address: string,
    private readonly client: PublicClient
  ) {
    this.address = toAddress(address, "price feed");
  }

  async latestRoundData(): Promise<RoundData> {
    const [roundId, answer, startedAt, updatedAt, answeredInRound] = await this.client.readContract({
      address: this.address,
      abi: AGGREGATOR_V3_ABI,
      functionName: "latestRoundData",
    });
    logger.debug("Round read", { feed: this.address, roundId, answer, updatedAt });
    return { roundId, answer, startedAt, updatedAt, answeredInRound };
  }

  async decimals(): Promise<number> {
    return this.client.readContract({
      address: this.address,
      abi: AGGREGATOR_V3_ABI,
      functionName: "decimals",
    });
  }
}
