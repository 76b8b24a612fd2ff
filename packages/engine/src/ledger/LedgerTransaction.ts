import type { Address } from "viem";
import { LedgerState, cloneRecord, type AccountRecord } from "./LedgerState.js";

type Reader = (account: Address) => AccountRecord | undefined;
type Writer = (account: Address, record: AccountRecord) => void;

/**
 * Copy-on-write overlay over the committed ledger. Reads fall through to the
 * committed records until an account is first written; nothing reaches the
 * ledger before `commit()`.
 */
export class LedgerTransaction extends LedgerState {
  private staged = new Map<Address, AccountRecord>();
  private closed = false;

  constructor(
    private readonly readCommitted: Reader,
    private readonly writeCommitted: Writer
  ) {
    super();
  }

  protected read(account: Address): AccountRecord | undefined {
    return this.staged.get(account) ?? this.readCommitted(account);
  }

  protected write(account: Address): AccountRecord {
    this.assertOpen();
    let record = this.staged.get(account);
    if (!record) {
      record = cloneRecord(this.readCommitted(account));
      this.staged.set(account, record);
    }
    return record;
  }

  /** Accounts written so far. */
  touched(): Address[] {
    return Array.from(this.staged.keys());
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  commit(): void {
    this.assertOpen();
    for (const [account, record] of this.staged) {
      this.writeCommitted(account, record);
    }
    this.closed = true;
  }

  /** Drop every staged write. */
  discard(): void {
    this.staged.clear();
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Ledger transaction is already closed");
    }
  }
}
