// ============================================
// Token movements used by engine operations
// ============================================

import type { Address } from "viem";
import { createLogger, toError } from "@pegmint/common";
import { EngineError, transferFailed } from "../errors.js";
import type { CollateralToken, PeggedToken } from "../interfaces.js";
import type { Movement } from "./Settlement.js";

const logger = createLogger("engine:movements");

/** Run a token call that reports success as a boolean; map any failure to `fail`. */
async function call(
  invoke: () => Promise<boolean>,
  fail: (cause?: unknown) => EngineError
): Promise<void> {
  let ok: boolean;
  try {
    ok = await invoke();
  } catch (err) {
    throw fail(err);
  }
  if (!ok) throw fail();
}

export function pullCollateral(
  token: CollateralToken,
  from: Address,
  custody: Address,
  amount: bigint
): Movement {
  return {
    phase: "pull",
    label: `pull ${amount} ${token.address} from ${from}`,
    execute: () =>
      call(
        () => token.transferFrom(from, custody, amount),
        (cause) => transferFailed(token.address, from, custody, amount, cause)
      ),
    compensate: () =>
      call(
        () => token.transfer(from, amount),
        (cause) => transferFailed(token.address, custody, from, amount, cause)
      ),
  };
}

export function pushCollateral(
  token: CollateralToken,
  custody: Address,
  to: Address,
  amount: bigint
): Movement {
  return {
    phase: "push",
    label: `push ${amount} ${token.address} to ${to}`,
    execute: () =>
      call(
        () => token.transfer(to, amount),
        (cause) => transferFailed(token.address, custody, to, amount, cause)
      ),
  };
}

/** Take pegged tokens from `payer` into custody and destroy them. */
export function pullAndBurn(
  token: PeggedToken,
  payer: Address,
  custody: Address,
  amount: bigint
): Movement {
  const mintFailed = (cause?: unknown) =>
    new EngineError("MINT_FAILED", `Re-minting ${amount} to ${payer} failed`, { to: payer, amount }, { cause });

  return {
    phase: "pull",
    label: `burn ${amount} pegged from ${payer}`,
    execute: async () => {
      await call(
        () => token.transferFrom(payer, custody, amount),
        (cause) => transferFailed(token.address, payer, custody, amount, cause)
      );
      try {
        await token.burn(amount);
      } catch (err) {
        const failure = new EngineError(
          "BURN_FAILED",
          `Burning ${amount} pegged tokens failed`,
          { amount },
          { cause: err }
        );
        try {
          await call(
            () => token.transfer(payer, amount),
            (cause) => transferFailed(token.address, custody, payer, amount, cause)
          );
        } catch (refundErr) {
          const refundError = toError(refundErr);
          logger.error(`Refund of ${amount} pegged to ${payer} failed after burn error`, {
            error: refundError.message,
          });
          failure.compensationErrors.push(refundError);
        }
        throw failure;
      }
    },
    compensate: () => call(() => token.mint(payer, amount), mintFailed),
  };
}

export function mintPegged(token: PeggedToken, to: Address, amount: bigint): Movement {
  return {
    phase: "push",
    label: `mint ${amount} pegged to ${to}`,
    execute: () =>
      call(
        () => token.mint(to, amount),
        (cause) =>
          new EngineError("MINT_FAILED", `Minting ${amount} to ${to} failed`, { to, amount }, { cause })
      ),
  };
}
