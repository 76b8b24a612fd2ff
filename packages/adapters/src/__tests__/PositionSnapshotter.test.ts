import { describe, it, expect } from "vitest";
import type { QueryResult, QueryResultRow } from "pg";
import { maxUint256, type Address } from "viem";
import type { QueryFn } from "@pegmint/common";
import { EngineError, calculateHealthFactor, toAddress, type AccountInformation } from "@pegmint/engine";
import { PositionSnapshotter, type PositionSource } from "../persistence/PositionSnapshotter.js";

const INDEBTED: Address = "0x1111111111111111111111111111111111111111";
const CLEAN: Address = "0x2222222222222222222222222222222222222222";
const STALE: Address = "0x3333333333333333333333333333333333333333";
const ETHER = 10n ** 18n;

function recordingQuery() {
  const calls: Array<{ text: string; params?: unknown[] }> = [];
  const query: QueryFn = async <T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> => {
    calls.push({ text, params });
    return { command: "INSERT", rowCount: 1, oid: 0, fields: [], rows: [] };
  };
  return { calls, query };
}

type Positions = Map<Address, AccountInformation | Error>;

function source(positions: Positions): PositionSource {
  return {
    listAccounts: () => Array.from(positions.keys()),
    getAccountInformation: async (account: string) => {
      const position = positions.get(toAddress(account, "account"));
      if (position === undefined) throw new Error(`unknown account ${account}`);
      if (position instanceof Error) throw position;
      return position;
    },
    calculateHealthFactor,
  };
}

describe("PositionSnapshotter", () => {
  it("upserts one row per account with decimal-string amounts", async () => {
    const { calls, query } = recordingQuery();
    const snapshotter = new PositionSnapshotter(
      source(
        new Map<Address, AccountInformation | Error>([
          [INDEBTED, { totalDebt: 100n * ETHER, collateralValueUsd: 400n * ETHER }],
          [CLEAN, { totalDebt: 0n, collateralValueUsd: 0n }],
        ])
      ),
      query
    );

    await expect(snapshotter.snapshotAll()).resolves.toEqual({ written: 2, skipped: [] });

    expect(calls.map((call) => call.params)).toEqual([
      [INDEBTED, "100000000000000000000", "400000000000000000000", "2000000000000000000"],
      [CLEAN, "0", "0", maxUint256.toString()],
    ]);
    expect(calls[0].text).toContain("ON CONFLICT (account) DO UPDATE");
  });

  it("skips accounts whose price cannot be read", async () => {
    const { calls, query } = recordingQuery();
    const snapshotter = new PositionSnapshotter(
      source(
        new Map<Address, AccountInformation | Error>([
          [STALE, new EngineError("STALE_PRICE", "Price is stale")],
          [CLEAN, { totalDebt: 0n, collateralValueUsd: 0n }],
        ])
      ),
      query
    );

    await expect(snapshotter.snapshotAll()).resolves.toEqual({ written: 1, skipped: [STALE] });
    expect(calls).toHaveLength(1);
  });

  it("propagates other failures", async () => {
    const { query } = recordingQuery();
    const snapshotter = new PositionSnapshotter(
      source(new Map<Address, AccountInformation | Error>([[INDEBTED, new Error("ledger unavailable")]])),
      query
    );
    await expect(snapshotter.snapshotAll()).rejects.toThrow("ledger unavailable");
  });
});
