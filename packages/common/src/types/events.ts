// ============================================
// BullMQ Event/Job Types (shared with indexers)
// ============================================

// Queue names
export const QUEUES = {
  ENGINE_EVENTS: "engine-events",
} as const;

/**
 * Wire form of a committed engine event. Amounts travel as base-10 strings
 * because job payloads are JSON.
 */
export type EngineEventJob =
  | {
      type: "collateral_deposited";
      account: string;
      asset: string;
      amount: string;
      timestamp: string;
    }
  | {
      type: "collateral_redeemed";
      from: string;
      to: string;
      asset: string;
      amount: string;
      timestamp: string;
    }
  | {
      type: "debt_minted";
      account: string;
      amount: string;
      timestamp: string;
    }
  | {
      type: "debt_burned";
      account: string;
      payer: string;
      amount: string;
      timestamp: string;
    }
  | {
      type: "account_liquidated";
      liquidator: string;
      target: string;
      asset: string;
      debtCovered: string;
      collateralSeized: string;
      timestamp: string;
    };
