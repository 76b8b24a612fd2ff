// ============================================
// Valuation Service (collateral <-> USD)
// ============================================

import type { Address } from "viem";
import { ADDITIONAL_FEED_PRECISION, PRECISION } from "../constants.js";
import { EngineError } from "../errors.js";
import type { LedgerView } from "../ledger/LedgerState.js";
import type { OracleAdapter } from "../oracle/OracleAdapter.js";

/** USD value (18 decimals) of `amount` at an 8-decimal `price`. */
export function toUsdValue(price: bigint, amount: bigint): bigint {
  return (price * ADDITIONAL_FEED_PRECISION * amount) / PRECISION;
}

/** Token amount (18 decimals) worth `usdAmount` at an 8-decimal `price`. */
export function toTokenAmount(price: bigint, usdAmount: bigint): bigint {
  return (usdAmount * PRECISION) / (price * ADDITIONAL_FEED_PRECISION);
}

export class ValuationService {
  constructor(
    private readonly oracle: OracleAdapter,
    private readonly assets: readonly Address[],
    private readonly pinned?: Map<Address, bigint>
  ) {}

  /**
   * A valuation that reads each asset's price at most once and reuses it for
   * every later conversion. Engine operations value against one of these so
   * all their checks see the same prices.
   */
  pinPrices(): ValuationService {
    return new ValuationService(this.oracle, this.assets, new Map());
  }

  async priceOf(asset: Address): Promise<bigint> {
    const cached = this.pinned?.get(asset);
    if (cached !== undefined) return cached;

    const { price } = await this.oracle.latestPrice(asset);
    if (price <= 0n) {
      throw new EngineError("INVALID_PRICE", `Price for ${asset} is not positive`, { asset, price });
    }
    this.pinned?.set(asset, price);
    return price;
  }

  async usdValue(asset: Address, amount: bigint): Promise<bigint> {
    if (amount === 0n) {
      // Still reject unregistered assets.
      this.oracle.feedFor(asset);
      return 0n;
    }
    return toUsdValue(await this.priceOf(asset), amount);
  }

  async tokenAmountForUsd(asset: Address, usdAmount: bigint): Promise<bigint> {
    return toTokenAmount(await this.priceOf(asset), usdAmount);
  }

  async accountCollateralValueUsd(ledger: LedgerView, account: Address): Promise<bigint> {
    let total = 0n;
    for (const asset of this.assets) {
      const balance = ledger.collateralOf(account, asset);
      if (balance === 0n) continue;
      total += await this.usdValue(asset, balance);
    }
    return total;
  }
}
