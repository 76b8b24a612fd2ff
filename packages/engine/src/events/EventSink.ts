// ============================================
// Engine Events
// ============================================

import type { Address } from "viem";

export type EngineEvent =
  | { type: "collateral_deposited"; account: Address; asset: Address; amount: bigint }
  | { type: "collateral_redeemed"; from: Address; to: Address; asset: Address; amount: bigint }
  | { type: "debt_minted"; account: Address; amount: bigint }
  | { type: "debt_burned"; account: Address; payer: Address; amount: bigint }
  | {
      type: "account_liquidated";
      liquidator: Address;
      target: Address;
      asset: Address;
      debtCovered: bigint;
      collateralSeized: bigint;
    };

export type EngineEventOf<T extends EngineEvent["type"]> = Extract<EngineEvent, { type: T }>;

/** Receives the events of an operation once it has committed. */
export interface EventSink {
  publish(events: readonly EngineEvent[]): Promise<void>;
}

export class InMemoryEventLog implements EventSink {
  readonly events: EngineEvent[] = [];

  async publish(events: readonly EngineEvent[]): Promise<void> {
    this.events.push(...events);
  }

  ofType<T extends EngineEvent["type"]>(type: T): EngineEventOf<T>[] {
    return this.events.filter((e): e is EngineEventOf<T> => e.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}
