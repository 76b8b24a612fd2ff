// ============================================
// Ledger State (shared by ledger and transactions)
// ============================================

import type { Address } from "viem";
import { EngineError, ledgerUnderflow } from "../errors.js";

export interface AccountRecord {
  collateral: Map<Address, bigint>;
  debt: bigint;
}

/** Read side of the ledger; valuation and health checks only need this. */
export interface LedgerView {
  collateralOf(account: Address, asset: Address): bigint;
  debtOf(account: Address): bigint;
}

export function cloneRecord(record: AccountRecord | undefined): AccountRecord {
  return {
    collateral: new Map(record?.collateral ?? []),
    debt: record?.debt ?? 0n,
  };
}

function assertNonNegative(amount: bigint, field: string): void {
  if (amount < 0n) {
    throw new EngineError("NEGATIVE_AMOUNT", `${field} amount must not be negative`, {
      field,
      amount,
    });
  }
}

export abstract class LedgerState implements LedgerView {
  /** Current record of an account, or undefined if it was never written. */
  protected abstract read(account: Address): AccountRecord | undefined;

  /** Mutable record of an account, created on first write. */
  protected abstract write(account: Address): AccountRecord;

  collateralOf(account: Address, asset: Address): bigint {
    return this.read(account)?.collateral.get(asset) ?? 0n;
  }

  debtOf(account: Address): bigint {
    return this.read(account)?.debt ?? 0n;
  }

  increaseCollateral(account: Address, asset: Address, amount: bigint): void {
    assertNonNegative(amount, "collateral");
    const record = this.write(account);
    record.collateral.set(asset, (record.collateral.get(asset) ?? 0n) + amount);
  }

  decreaseCollateral(account: Address, asset: Address, amount: bigint): void {
    assertNonNegative(amount, "collateral");
    const balance = this.collateralOf(account, asset);
    if (amount > balance) {
      throw ledgerUnderflow(account, `collateral ${asset}`, balance, amount);
    }
    this.write(account).collateral.set(asset, balance - amount);
  }

  increaseDebt(account: Address, amount: bigint): void {
    assertNonNegative(amount, "debt");
    const record = this.write(account);
    record.debt += amount;
  }

  decreaseDebt(account: Address, amount: bigint): void {
    assertNonNegative(amount, "debt");
    const balance = this.debtOf(account);
    if (amount > balance) {
      throw ledgerUnderflow(account, "debt", balance, amount);
    }
    this.write(account).debt = balance - amount;
  }
}
