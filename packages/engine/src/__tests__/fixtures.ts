import type { Address } from "viem";
import { StablecoinEngine, type EngineOptions } from "../StablecoinEngine.js";
import { InMemoryEventLog } from "../events/EventSink.js";
import type { CollateralToken, PeggedToken, PriceFeed, RoundData } from "../interfaces.js";

export const USER = "0x1111111111111111111111111111111111111111";
export const LIQUIDATOR = "0x2222222222222222222222222222222222222222";
export const WETH = "0x3000000000000000000000000000000000000003";
export const WBTC = "0x4000000000000000000000000000000000000004";
export const PEG = "0x5000000000000000000000000000000000000005";
export const ETH_FEED = "0x6000000000000000000000000000000000000006";
export const BTC_FEED = "0x7000000000000000000000000000000000000007";
export const CUSTODY = "0x9999999999999999999999999999999999999999";

export const ETHER = 10n ** 18n;
export const ETH_USD_PRICE = 2000n * 10n ** 8n;
export const BTC_USD_PRICE = 1000n * 10n ** 8n;
export const START_TIME = 1_700_000_000;

export class FakeClock {
  constructor(public seconds: number = START_TIME) {}

  now = (): number => this.seconds;

  advance(seconds: number): void {
    this.seconds += seconds;
  }
}

type TokenMethod = "transfer" | "transferFrom" | "mint" | "burn";

/**
 * ERC20-style ledger whose only privileged caller is `operator` (the engine's
 * custody address): it spends allowances, transfers from its own balance and
 * is the sole minter/burner.
 */
export class InMemoryToken implements CollateralToken, PeggedToken {
  readonly balances = new Map<Address, bigint>();
  private allowances = new Map<string, bigint>();
  private failing = new Set<TokenMethod>();
  totalSupply = 0n;

  /** Runs inside `transferFrom`, before any balance moves. */
  onTransferFrom?: (from: Address, amount: bigint) => Promise<void>;

  constructor(
    readonly address: Address,
    private readonly operator: Address
  ) {}

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /** Test faucet. */
  faucet(to: Address, amount: bigint): void {
    this.credit(to, amount);
    this.totalSupply += amount;
  }

  approve(owner: Address, amount: bigint): void {
    this.allowances.set(owner, amount);
  }

  allowance(owner: Address): bigint {
    return this.allowances.get(owner) ?? 0n;
  }

  fail(method: TokenMethod, enabled = true): void {
    if (enabled) this.failing.add(method);
    else this.failing.delete(method);
  }

  async transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean> {
    if (this.onTransferFrom) await this.onTransferFrom(from, amount);
    if (this.failing.has("transferFrom")) return false;
    const allowance = this.allowance(from);
    if (allowance < amount || this.balanceOf(from) < amount) return false;
    this.allowances.set(from, allowance - amount);
    this.debit(from, amount);
    this.credit(to, amount);
    return true;
  }

  async transfer(to: Address, amount: bigint): Promise<boolean> {
    if (this.failing.has("transfer")) return false;
    if (this.balanceOf(this.operator) < amount) return false;
    this.debit(this.operator, amount);
    this.credit(to, amount);
    return true;
  }

  async mint(to: Address, amount: bigint): Promise<boolean> {
    if (this.failing.has("mint")) return false;
    this.credit(to, amount);
    this.totalSupply += amount;
    return true;
  }

  async burn(amount: bigint): Promise<void> {
    if (this.failing.has("burn")) throw new Error("burn rejected");
    if (this.balanceOf(this.operator) < amount) throw new Error("burn amount exceeds balance");
    this.debit(this.operator, amount);
    this.totalSupply -= amount;
  }

  private credit(account: Address, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  private debit(account: Address, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) - amount);
  }
}

/** Aggregator stand-in whose rounds are stamped with the fake clock. */
export class ManualPriceFeed implements PriceFeed {
  private round: RoundData;
  unavailable = false;
  reads = 0;

  /** Runs after each answer is returned, e.g. to move the price mid-operation. */
  afterRead?: () => void;

  constructor(
    readonly address: Address,
    answer: bigint,
    private readonly clock: FakeClock
  ) {
    const now = BigInt(clock.now());
    this.round = { roundId: 1n, answer, startedAt: now, updatedAt: now, answeredInRound: 1n };
  }

  updateAnswer(answer: bigint): void {
    const roundId = this.round.roundId + 1n;
    const now = BigInt(this.clock.now());
    this.round = { roundId, answer, startedAt: now, updatedAt: now, answeredInRound: roundId };
  }

  setRound(round: Partial<RoundData>): void {
    this.round = { ...this.round, ...round };
  }

  async latestRoundData(): Promise<RoundData> {
    if (this.unavailable) throw new Error("feed offline");
    this.reads += 1;
    const round = { ...this.round };
    this.afterRead?.();
    return round;
  }
}

export interface Harness {
  engine: StablecoinEngine;
  weth: InMemoryToken;
  wbtc: InMemoryToken;
  peg: InMemoryToken;
  ethFeed: ManualPriceFeed;
  btcFeed: ManualPriceFeed;
  clock: FakeClock;
  events: InMemoryEventLog;
}

export function createHarness(overrides: Partial<EngineOptions> = {}): Harness {
  const clock = new FakeClock();
  const weth = new InMemoryToken(WETH, CUSTODY);
  const wbtc = new InMemoryToken(WBTC, CUSTODY);
  const peg = new InMemoryToken(PEG, CUSTODY);
  const ethFeed = new ManualPriceFeed(ETH_FEED, ETH_USD_PRICE, clock);
  const btcFeed = new ManualPriceFeed(BTC_FEED, BTC_USD_PRICE, clock);
  const events = new InMemoryEventLog();

  const engine = new StablecoinEngine({
    collateralTokens: [weth, wbtc],
    priceFeeds: [ethFeed, btcFeed],
    peggedToken: peg,
    custody: CUSTODY,
    now: clock.now,
    eventSink: events,
    ...overrides,
  });

  return { engine, weth, wbtc, peg, ethFeed, btcFeed, clock, events };
}

/** Give `account` collateral and approve the engine to pull it. */
export function fund(token: InMemoryToken, account: Address, amount: bigint): void {
  token.faucet(account, amount);
  token.approve(account, token.allowance(account) + amount);
}
