// ============================================
// Position Snapshotter (engine -> Postgres)
// ============================================

import type { Address } from "viem";
import { createLogger, toError, type QueryFn } from "@pegmint/common";
import { isEngineError, type StablecoinEngine } from "@pegmint/engine";

const logger = createLogger("adapters:snapshots");

export interface PositionSnapshot {
  account: Address;
  debt: bigint;
  collateralValueUsd: bigint;
  healthFactor: bigint;
}

/** The engine queries a snapshot needs. */
export type PositionSource = Pick<StablecoinEngine, "listAccounts" | "getAccountInformation" | "calculateHealthFactor">;

export interface SnapshotResult {
  written: number;
  skipped: Address[];
}

const UPSERT_POSITION = `INSERT INTO engine_positions (account, debt, collateral_value_usd, health_factor)
   VALUES ($1, $2, $3, $4)
   ON CONFLICT (account) DO UPDATE SET
     debt = $2, collateral_value_usd = $3, health_factor = $4, updated_at = NOW()`;

/**
 * Copies each account's committed position into `engine_positions`. Only reads
 * the engine; accounts whose price is unusable right now are skipped.
 */
export class PositionSnapshotter {
  constructor(
    private readonly engine: PositionSource,
    private readonly query: QueryFn
  ) {}

  async read(account: Address): Promise<PositionSnapshot> {
    const { totalDebt, collateralValueUsd } = await this.engine.getAccountInformation(account);
    return {
      account,
      debt: totalDebt,
      collateralValueUsd,
      healthFactor: this.engine.calculateHealthFactor(totalDebt, collateralValueUsd),
    };
  }

  async snapshotAll(): Promise<SnapshotResult> {
    const result: SnapshotResult = { written: 0, skipped: [] };

    for (const account of this.engine.listAccounts()) {
      let snapshot: PositionSnapshot;
      try {
        snapshot = await this.read(account);
      } catch (err) {
        if (!isEngineError(err) || (err.code !== "STALE_PRICE" && err.code !== "ORACLE_UNAVAILABLE")) {
          throw toError(err);
        }
        logger.warn(`Skipping ${account}`, { code: err.code, error: err.message });
        result.skipped.push(account);
        continue;
      }

      await this.query(UPSERT_POSITION, [
        snapshot.account,
        snapshot.debt.toString(),
        snapshot.collateralValueUsd.toString(),
        snapshot.healthFactor.toString(),
      ]);
      result.written++;
    }

    logger.info("Position snapshot complete", { written: result.written, skipped: result.skipped.length });
    return result;
  }
}
