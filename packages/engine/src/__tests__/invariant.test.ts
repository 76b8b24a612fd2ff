import { describe, it, expect } from "vitest";
import type { Address } from "viem";
import { isEngineError } from "../errors.js";
import { CUSTODY, ETHER, LIQUIDATOR, USER, WBTC, WETH, createHarness, fund, type Harness } from "./fixtures.js";

const ACCOUNTS: Address[] = [USER, LIQUIDATOR, "0x3333333333333333333333333333333333333333"];

/** Small seeded PRNG so failures reproduce. */
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

function amountBelow(random: () => number, max: bigint): bigint {
  if (max <= 0n) return 0n;
  return (BigInt(Math.floor(random() * 1_000_000)) * max) / 1_000_000n;
}

const LIQUIDATION_OUTCOMES = [
  "HEALTH_FACTOR_OK",
  "HEALTH_FACTOR_NOT_IMPROVED",
  "INSUFFICIENT_COLLATERAL_FOR_LIQUIDATION",
  "BREAKS_HEALTH_FACTOR",
] as const;

function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/** Debt `account` can repay from its own pegged balance. */
function repayable(h: Harness, account: Address): bigint {
  return min(h.engine.getDebt(account), h.peg.balanceOf(account));
}

async function randomStep(h: Harness, random: () => number): Promise<void> {
  const account = pick(random, ACCOUNTS);
  const token = pick(random, [h.weth, h.wbtc]);
  const action = Math.floor(random() * 6);

  switch (action) {
    case 0: {
      const amount = amountBelow(random, 20n * ETHER) + 1n;
      fund(token, account, amount);
      await h.engine.depositCollateral({ account, asset: token.address, amount });
      return;
    }
    case 1: {
      const { totalDebt, collateralValueUsd } = await h.engine.getAccountInformation(account);
      const headroom = collateralValueUsd / 2n - totalDebt;
      const amount = amountBelow(random, headroom);
      if (amount === 0n) return;
      await h.engine.mintDebt({ account, amount });
      return;
    }
    case 2: {
      const amount = amountBelow(random, h.engine.getCollateralBalance(account, token.address));
      if (amount === 0n) return;
      try {
        await h.engine.redeemCollateral({ account, asset: token.address, amount });
      } catch (err) {
        if (!isEngineError(err, "BREAKS_HEALTH_FACTOR")) throw err;
      }
      return;
    }
    case 3: {
      const amount = amountBelow(random, repayable(h, account));
      if (amount === 0n) return;
      h.peg.approve(account, amount);
      await h.engine.burnDebt({ account, amount });
      return;
    }
    case 4: {
      const debtAmount = amountBelow(random, repayable(h, account));
      const collateralAmount = amountBelow(random, h.engine.getCollateralBalance(account, token.address));
      if (debtAmount === 0n || collateralAmount === 0n) return;
      h.peg.approve(account, debtAmount);
      try {
        await h.engine.redeemCollateralForDebt({ account, asset: token.address, collateralAmount, debtAmount });
      } catch (err) {
        if (!isEngineError(err, "BREAKS_HEALTH_FACTOR")) throw err;
      }
      return;
    }
    default: {
      const target = pick(random, ACCOUNTS.filter((candidate) => candidate !== account));
      const debtToCover = amountBelow(random, min(h.engine.getDebt(target), h.peg.balanceOf(account)));
      if (debtToCover === 0n) return;
      h.peg.approve(account, debtToCover);
      try {
        await h.engine.liquidate({ liquidator: account, asset: token.address, target, debtToCover });
      } catch (err) {
        if (!LIQUIDATION_OUTCOMES.some((code) => isEngineError(err, code))) throw err;
      }
    }
  }
}

function expectBookkeepingHolds(h: Harness): void {
  expect(h.peg.totalSupply).toBe(h.engine.getTotalDebt());

  let wethInLedger = 0n;
  let wbtcInLedger = 0n;
  for (const account of h.engine.listAccounts()) {
    wethInLedger += h.engine.getCollateralBalance(account, WETH);
    wbtcInLedger += h.engine.getCollateralBalance(account, WBTC);
  }
  expect(h.weth.balanceOf(CUSTODY)).toBe(wethInLedger);
  expect(h.wbtc.balanceOf(CUSTODY)).toBe(wbtcInLedger);
}

async function expectSolvency(h: Harness): Promise<void> {
  expect(await h.engine.getSystemCollateralValueUsd()).toBeGreaterThanOrEqual(h.peg.totalSupply);
  for (const account of h.engine.listAccounts()) {
    if (h.engine.getDebt(account) === 0n) continue;
    expect(await h.engine.getHealthFactor(account)).toBeGreaterThanOrEqual(ETHER);
  }
}

describe("engine invariants", () => {
  it.each([1, 7, 42, 1337])("hold across random operations with rising prices (seed %i)", async (seed) => {
    const h = createHarness();
    const random = mulberry32(seed);
    let ethPrice = 2000n * 10n ** 8n;

    for (let step = 0; step < 120; step++) {
      await randomStep(h, random);
      if (random() < 0.1) {
        ethPrice += BigInt(Math.floor(random() * 100)) * 10n ** 8n;
        h.ethFeed.updateAnswer(ethPrice);
      }
      expectBookkeepingHolds(h);
      await expectSolvency(h);
    }
  });

  it("hold once a liquidation settles", async () => {
    const h = createHarness();
    fund(h.weth, USER, 10n * ETHER);
    await h.engine.depositCollateralAndMintDebt({
      account: USER,
      asset: WETH,
      collateralAmount: 10n * ETHER,
      debtAmount: 100n * ETHER,
    });
    fund(h.wbtc, LIQUIDATOR, ETHER);
    await h.engine.depositCollateralAndMintDebt({
      account: LIQUIDATOR,
      asset: WBTC,
      collateralAmount: ETHER,
      debtAmount: 100n * ETHER,
    });
    h.ethFeed.updateAnswer(18n * 10n ** 8n);
    h.peg.approve(LIQUIDATOR, 100n * ETHER);

    await h.engine.liquidate({ liquidator: LIQUIDATOR, asset: WETH, target: USER, debtToCover: 100n * ETHER });

    expect(h.engine.getTotalDebt()).toBe(100n * ETHER);
    expectBookkeepingHolds(h);
    await expectSolvency(h);
  });

  it.each([99, 2024])("keep supply and custody in step through liquidations (seed %i)", async (seed) => {
    const h = createHarness();
    const random = mulberry32(seed);

    for (let step = 0; step < 40; step++) await randomStep(h, random);
    // Collateral stays above the debt, so liquidations can still pay their bonus.
    h.ethFeed.updateAnswer(1500n * 10n ** 8n);
    h.btcFeed.updateAnswer(750n * 10n ** 8n);

    for (let step = 0; step < 80; step++) {
      await randomStep(h, random);
      expectBookkeepingHolds(h);
    }
  });
});
