// ============================================
// Stablecoin Engine
//
// Users lock registered collateral and mint the pegged
// token against it. Every account with debt must keep a
// health factor of at least 1.0; accounts below it can be
// liquidated by anyone holding pegged tokens.
// ============================================

import type { Address } from "viem";
import { createLogger, toError, DEFAULT_ORACLE_TIMEOUT_SECONDS, type LogMeta } from "@pegmint/common";
import { toAddress } from "./address.js";
import {
  ADDITIONAL_FEED_PRECISION,
  FEED_PRECISION,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
  type EngineParameters,
} from "./constants.js";
import {
  EngineError,
  breaksHealthFactor,
  burnExceedsDebt,
  needsMoreThanZero,
  redeemExceedsCollateral,
  tokenNotAllowed,
} from "./errors.js";
import { InMemoryEventLog, type EngineEvent, type EventSink } from "./events/EventSink.js";
import { calculateHealthFactor } from "./health/healthFactor.js";
import type { CollateralToken, PeggedToken, PriceFeed } from "./interfaces.js";
import { AccountLedger } from "./ledger/AccountLedger.js";
import type { LedgerView } from "./ledger/LedgerState.js";
import type { LedgerTransaction } from "./ledger/LedgerTransaction.js";
import { OracleAdapter, systemClock, type Clock } from "./oracle/OracleAdapter.js";
import { OperationGuard } from "./runtime/OperationGuard.js";
import { Settlement } from "./runtime/Settlement.js";
import { mintPegged, pullAndBurn, pullCollateral, pushCollateral } from "./runtime/movements.js";
import { ValuationService } from "./valuation/ValuationService.js";

const logger = createLogger("engine:core");

export interface EngineOptions {
  /** Registered collateral, paired by index with `priceFeeds`. */
  collateralTokens: readonly CollateralToken[];
  priceFeeds: readonly PriceFeed[];
  peggedToken: PeggedToken;
  /** Address holding deposited collateral and pegged tokens pending burn. */
  custody: string;
  oracleTimeoutSeconds?: number;
  now?: Clock;
  eventSink?: EventSink;
}

export interface AccountInformation {
  totalDebt: bigint;
  collateralValueUsd: bigint;
}

export interface DepositCollateralParams {
  account: string;
  asset: string;
  amount: bigint;
}

export interface MintDebtParams {
  account: string;
  amount: bigint;
}

export interface RedeemCollateralParams {
  account: string;
  asset: string;
  amount: bigint;
}

export interface BurnDebtParams {
  account: string;
  amount: bigint;
}

export interface CollateralAndDebtParams {
  account: string;
  asset: string;
  collateralAmount: bigint;
  debtAmount: bigint;
}

export interface LiquidateParams {
  liquidator: string;
  asset: string;
  target: string;
  debtToCover: bigint;
}

export interface LiquidationResult {
  collateralSeized: bigint;
  bonus: bigint;
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

/** Staged state of the operation in flight. */
interface OperationContext {
  ledger: LedgerTransaction;
  /** Prices read once per asset for the whole operation. */
  valuation: ValuationService;
  settlement: Settlement;
  events: EngineEvent[];
}

function requirePositive(amount: bigint, field: string): void {
  if (amount <= 0n) throw needsMoreThanZero(field);
}

export class StablecoinEngine {
  private readonly ledger = new AccountLedger();
  private readonly guard = new OperationGuard();
  private readonly tokens = new Map<Address, CollateralToken>();
  private readonly feeds = new Map<Address, PriceFeed>();
  private readonly assets: Address[] = [];
  private readonly oracle: OracleAdapter;
  private readonly valuation: ValuationService;
  private readonly peggedToken: PeggedToken;
  private readonly custody: Address;
  private readonly eventSink: EventSink;
  /** Publications in commit order; never rejects. */
  private outbox: Promise<void> = Promise.resolve();

  constructor(options: EngineOptions) {
    const { collateralTokens, priceFeeds } = options;
    if (collateralTokens.length !== priceFeeds.length) {
      throw new EngineError(
        "CONFIG_LENGTH_MISMATCH",
        `Got ${collateralTokens.length} collateral tokens but ${priceFeeds.length} price feeds`,
        { tokens: collateralTokens.length, feeds: priceFeeds.length }
      );
    }

    collateralTokens.forEach((token, i) => {
      const asset = toAddress(token.address, "collateral token");
      if (this.tokens.has(asset)) {
        throw new EngineError("DUPLICATE_ASSET", `Collateral ${asset} is registered twice`, { asset });
      }
      this.tokens.set(asset, token);
      this.feeds.set(asset, priceFeeds[i]);
      this.assets.push(asset);
    });

    this.peggedToken = options.peggedToken;
    this.custody = toAddress(options.custody, "custody");
    this.eventSink = options.eventSink ?? new InMemoryEventLog();
    this.oracle = new OracleAdapter(
      this.feeds,
      options.oracleTimeoutSeconds ?? DEFAULT_ORACLE_TIMEOUT_SECONDS,
      options.now ?? systemClock
    );
    this.valuation = new ValuationService(this.oracle, this.assets);

    logger.info("Engine configured", {
      assets: this.assets,
      peggedToken: this.peggedToken.address,
      custody: this.custody,
      oracleTimeoutSeconds: this.oracle.timeoutSeconds,
    });
  }

  // ---- Operations ----

  async depositCollateral(params: DepositCollateralParams): Promise<void> {
    const account = toAddress(params.account, "account");
    const asset = this.requireAsset(params.asset);
    requirePositive(params.amount, "amount");

    await this.execute("depositCollateral", { account, asset, amount: params.amount }, async (ctx) => {
      this.applyDeposit(ctx, account, asset, params.amount);
    });
  }

  async mintDebt(params: MintDebtParams): Promise<void> {
    const account = toAddress(params.account, "account");
    requirePositive(params.amount, "amount");

    await this.execute("mintDebt", { account, amount: params.amount }, async (ctx) => {
      await this.applyMint(ctx, account, params.amount);
    });
  }

  async depositCollateralAndMintDebt(params: CollateralAndDebtParams): Promise<void> {
    const account = toAddress(params.account, "account");
    const asset = this.requireAsset(params.asset);
    requirePositive(params.collateralAmount, "collateralAmount");
    requirePositive(params.debtAmount, "debtAmount");

    await this.execute(
      "depositCollateralAndMintDebt",
      { account, asset, collateralAmount: params.collateralAmount, debtAmount: params.debtAmount },
      async (ctx) => {
        this.applyDeposit(ctx, account, asset, params.collateralAmount);
        await this.applyMint(ctx, account, params.debtAmount);
      }
    );
  }

  async redeemCollateral(params: RedeemCollateralParams): Promise<void> {
    const account = toAddress(params.account, "account");
    const asset = this.requireAsset(params.asset);
    requirePositive(params.amount, "amount");

    await this.execute("redeemCollateral", { account, asset, amount: params.amount }, async (ctx) => {
      this.applyRedeem(ctx, account, account, asset, params.amount);
      await this.assertHealthy(ctx, account);
    });
  }

  async burnDebt(params: BurnDebtParams): Promise<void> {
    const account = toAddress(params.account, "account");
    requirePositive(params.amount, "amount");

    await this.execute("burnDebt", { account, amount: params.amount }, async (ctx) => {
      this.applyBurn(ctx, account, account, params.amount);
    });
  }

  async redeemCollateralForDebt(params: CollateralAndDebtParams): Promise<void> {
    const account = toAddress(params.account, "account");
    const asset = this.requireAsset(params.asset);
    requirePositive(params.collateralAmount, "collateralAmount");
    requirePositive(params.debtAmount, "debtAmount");

    await this.execute(
      "redeemCollateralForDebt",
      { account, asset, collateralAmount: params.collateralAmount, debtAmount: params.debtAmount },
      async (ctx) => {
        this.applyBurn(ctx, account, account, params.debtAmount);
        this.applyRedeem(ctx, account, account, asset, params.collateralAmount);
        await this.assertHealthy(ctx, account);
      }
    );
  }

  /**
   * Cover `debtToCover` of an unhealthy account's debt with the liquidator's
   * pegged tokens, in exchange for the equivalent collateral plus the bonus.
   *
   * Once an account's collateral is worth 110% of its debt or less, no
   * liquidation can improve it; such calls abort and the account stays as it is.
   */
  async liquidate(params: LiquidateParams): Promise<LiquidationResult> {
    const liquidator = toAddress(params.liquidator, "liquidator");
    const target = toAddress(params.target, "target");
    const asset = this.requireAsset(params.asset);
    const { debtToCover } = params;
    requirePositive(debtToCover, "debtToCover");

    return this.execute("liquidate", { liquidator, target, asset, debtToCover }, async (ctx) => {
      const startingHealthFactor = await this.healthFactorIn(ctx.valuation, ctx.ledger, target);
      if (startingHealthFactor >= MIN_HEALTH_FACTOR) {
        throw new EngineError("HEALTH_FACTOR_OK", `Account ${target} is not liquidatable`, {
          target,
          healthFactor: startingHealthFactor,
        });
      }

      const debtEquivalent = await ctx.valuation.tokenAmountForUsd(asset, debtToCover);
      const bonus = (debtEquivalent * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
      const collateralSeized = debtEquivalent + bonus;

      const available = ctx.ledger.collateralOf(target, asset);
      if (collateralSeized > available) {
        throw new EngineError(
          "INSUFFICIENT_COLLATERAL_FOR_LIQUIDATION",
          `Seizing ${collateralSeized} of ${asset} exceeds the ${available} held by ${target}`,
          { target, asset, collateralSeized, available }
        );
      }

      this.applyRedeem(ctx, target, liquidator, asset, collateralSeized);
      this.applyBurn(ctx, target, liquidator, debtToCover);

      const endingHealthFactor = await this.healthFactorIn(ctx.valuation, ctx.ledger, target);
      if (endingHealthFactor <= startingHealthFactor) {
        throw new EngineError(
          "HEALTH_FACTOR_NOT_IMPROVED",
          `Liquidation would not improve the health factor of ${target}`,
          { target, startingHealthFactor, endingHealthFactor }
        );
      }
      await this.assertHealthy(ctx, liquidator);

      ctx.events.push({
        type: "account_liquidated",
        liquidator,
        target,
        asset,
        debtCovered: debtToCover,
        collateralSeized,
      });

      return { collateralSeized, bonus, startingHealthFactor, endingHealthFactor };
    });
  }

  // ---- Read-only queries (committed state) ----

  getCollateralBalance(account: string, asset: string): bigint {
    return this.ledger.collateralOf(toAddress(account, "account"), toAddress(asset, "asset"));
  }

  getDebt(account: string): bigint {
    return this.ledger.debtOf(toAddress(account, "account"));
  }

  async getAccountCollateralValueUsd(account: string): Promise<bigint> {
    return this.valuation.accountCollateralValueUsd(this.ledger, toAddress(account, "account"));
  }

  async getAccountInformation(account: string): Promise<AccountInformation> {
    const address = toAddress(account, "account");
    return {
      totalDebt: this.ledger.debtOf(address),
      collateralValueUsd: await this.valuation.accountCollateralValueUsd(this.ledger, address),
    };
  }

  async getHealthFactor(account: string): Promise<bigint> {
    return this.healthFactorIn(this.valuation, this.ledger, toAddress(account, "account"));
  }

  async getUsdValue(asset: string, amount: bigint): Promise<bigint> {
    return this.valuation.usdValue(this.requireAsset(asset), amount);
  }

  async getTokenAmountFromUsd(asset: string, usdAmount: bigint): Promise<bigint> {
    return this.valuation.tokenAmountForUsd(this.requireAsset(asset), usdAmount);
  }

  calculateHealthFactor(debt: bigint, collateralValueUsd: bigint): bigint {
    return calculateHealthFactor(debt, collateralValueUsd);
  }

  getParameters(): EngineParameters {
    return {
      precision: PRECISION,
      feedPrecision: FEED_PRECISION,
      additionalFeedPrecision: ADDITIONAL_FEED_PRECISION,
      liquidationThreshold: LIQUIDATION_THRESHOLD,
      liquidationBonus: LIQUIDATION_BONUS,
      liquidationPrecision: LIQUIDATION_PRECISION,
      minHealthFactor: MIN_HEALTH_FACTOR,
      oracleTimeoutSeconds: this.oracle.timeoutSeconds,
    };
  }

  getCollateralAssets(): Address[] {
    return [...this.assets];
  }

  getPriceFeed(asset: string): Address {
    return this.oracle.feedFor(this.requireAsset(asset)).address;
  }

  getPeggedToken(): Address {
    return this.peggedToken.address;
  }

  getCustody(): Address {
    return this.custody;
  }

  listAccounts(): Address[] {
    return this.ledger.accounts();
  }

  getTotalDebt(): bigint {
    return this.ledger.totalDebt();
  }

  /** USD value of all collateral in custody. */
  async getSystemCollateralValueUsd(): Promise<bigint> {
    let total = 0n;
    for (const asset of this.assets) {
      total += await this.valuation.usdValue(asset, this.ledger.totalCollateral(asset));
    }
    return total;
  }

  // ---- Internals ----

  private requireAsset(value: string): Address {
    const asset = toAddress(value, "asset");
    if (!this.tokens.has(asset)) throw tokenNotAllowed(asset);
    return asset;
  }

  private collateralToken(asset: Address): CollateralToken {
    const token = this.tokens.get(asset);
    if (!token) throw tokenNotAllowed(asset);
    return token;
  }

  private async healthFactorIn(
    valuation: ValuationService,
    ledger: LedgerView,
    account: Address
  ): Promise<bigint> {
    const debt = ledger.debtOf(account);
    if (debt === 0n) return calculateHealthFactor(0n, 0n);
    return calculateHealthFactor(debt, await valuation.accountCollateralValueUsd(ledger, account));
  }

  private async assertHealthy(ctx: OperationContext, account: Address): Promise<void> {
    const healthFactor = await this.healthFactorIn(ctx.valuation, ctx.ledger, account);
    if (healthFactor < MIN_HEALTH_FACTOR) throw breaksHealthFactor(account, healthFactor);
  }

  private applyDeposit(ctx: OperationContext, account: Address, asset: Address, amount: bigint): void {
    ctx.ledger.increaseCollateral(account, asset, amount);
    ctx.settlement.add(pullCollateral(this.collateralToken(asset), account, this.custody, amount));
    ctx.events.push({ type: "collateral_deposited", account, asset, amount });
  }

  private async applyMint(ctx: OperationContext, account: Address, amount: bigint): Promise<void> {
    ctx.ledger.increaseDebt(account, amount);
    await this.assertHealthy(ctx, account);
    ctx.settlement.add(mintPegged(this.peggedToken, account, amount));
    ctx.events.push({ type: "debt_minted", account, amount });
  }

  private applyRedeem(
    ctx: OperationContext,
    from: Address,
    to: Address,
    asset: Address,
    amount: bigint
  ): void {
    const balance = ctx.ledger.collateralOf(from, asset);
    if (amount > balance) throw redeemExceedsCollateral(from, asset, balance, amount);
    ctx.ledger.decreaseCollateral(from, asset, amount);
    ctx.settlement.add(pushCollateral(this.collateralToken(asset), this.custody, to, amount));
    ctx.events.push({ type: "collateral_redeemed", from, to, asset, amount });
  }

  private applyBurn(ctx: OperationContext, onBehalfOf: Address, payer: Address, amount: bigint): void {
    const debt = ctx.ledger.debtOf(onBehalfOf);
    if (amount > debt) throw burnExceedsDebt(onBehalfOf, debt, amount);
    ctx.ledger.decreaseDebt(onBehalfOf, amount);
    ctx.settlement.add(pullAndBurn(this.peggedToken, payer, this.custody, amount));
    ctx.events.push({ type: "debt_burned", account: onBehalfOf, payer, amount });
  }

  /**
   * Run `body` against a staged ledger under the operation guard. Asset
   * movements settle after `body` returns; the ledger commits only if they all
   * succeed. Events are queued for publication once the guard is released and
   * the caller does not wait for them; see {@link flushEvents}.
   */
  private async execute<T>(
    operation: string,
    meta: LogMeta,
    body: (ctx: OperationContext) => Promise<T>
  ): Promise<T> {
    const { result, events } = await this.guard.run(operation, async () => {
      const ctx: OperationContext = {
        ledger: this.ledger.begin(),
        valuation: this.valuation.pinPrices(),
        settlement: new Settlement(),
        events: [],
      };

      let result: T;
      try {
        result = await body(ctx);
        await ctx.settlement.settle();
        ctx.ledger.commit();
      } catch (err) {
        if (ctx.ledger.isOpen) ctx.ledger.discard();
        const error = toError(err);
        logger.warn(`${operation} aborted`, {
          ...meta,
          code: error instanceof EngineError ? error.code : undefined,
          error: error.message,
        });
        throw error;
      }

      logger.info(`${operation} committed`, meta);
      return { result, events: ctx.events };
    });

    if (events.length > 0) {
      this.outbox = this.outbox.then(() => this.publish(operation, events));
    }
    return result;
  }

  /** Resolves once the events of every committed operation so far were handed to the sink. */
  flushEvents(): Promise<void> {
    return this.outbox;
  }

  private async publish(operation: string, events: EngineEvent[]): Promise<void> {
    try {
      await this.eventSink.publish(events);
    } catch (err) {
      // Committed; a publication failure does not undo the operation.
      logger.error(`Publishing events of ${operation} failed`, {
        error: toError(err).message,
        events: events.map((e) => e.type),
      });
    }
  }
}
