// ============================================
// Account Ledger
// ============================================

import type { Address } from "viem";
import { LedgerState, cloneRecord, type AccountRecord } from "./LedgerState.js";
import { LedgerTransaction } from "./LedgerTransaction.js";

/**
 * Committed per-account collateral and debt. Only the engine writes here,
 * and only by committing a {@link LedgerTransaction}.
 */
export class AccountLedger extends LedgerState {
  private records = new Map<Address, AccountRecord>();

  protected read(account: Address): AccountRecord | undefined {
    return this.records.get(account);
  }

  protected write(account: Address): AccountRecord {
    let record = this.records.get(account);
    if (!record) {
      record = cloneRecord(undefined);
      this.records.set(account, record);
    }
    return record;
  }

  begin(): LedgerTransaction {
    return new LedgerTransaction(
      (account) => this.records.get(account),
      (account, record) => this.records.set(account, record)
    );
  }

  accounts(): Address[] {
    return Array.from(this.records.keys());
  }

  totalDebt(): bigint {
    let total = 0n;
    for (const record of this.records.values()) total += record.debt;
    return total;
  }

  totalCollateral(asset: Address): bigint {
    let total = 0n;
    for (const record of this.records.values()) {
      total += record.collateral.get(asset) ?? 0n;
    }
    return total;
  }
}
