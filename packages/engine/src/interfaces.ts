// ============================================
// External Collaborators
// ============================================

import type { Address } from "viem";

/** Chainlink-style round: `answer` is the USD price with 8 decimals. */
export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface PriceFeed {
  /** Feed contract or identifier, surfaced by `getPriceFeed`. */
  readonly address: Address;
  latestRoundData(): Promise<RoundData>;
}

/** Fungible collateral asset; the engine moves it in and out of custody. */
export interface CollateralToken {
  readonly address: Address;
  transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean>;
  transfer(to: Address, amount: bigint): Promise<boolean>;
}

/**
 * The pegged unit. The engine is its only minter; `burn` destroys tokens held
 * in the engine's custody.
 */
export interface PeggedToken {
  readonly address: Address;
  mint(to: Address, amount: bigint): Promise<boolean>;
  burn(amount: bigint): Promise<void>;
  transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean>;
  transfer(to: Address, amount: bigint): Promise<boolean>;
}
