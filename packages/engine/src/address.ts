import { getAddress, isAddress, type Address } from "viem";
import { EngineError } from "./errors.js";

/** Checksum an address so ledger keys compare equal regardless of casing. */
export function toAddress(value: string, field = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new EngineError("INVALID_ADDRESS", `Invalid ${field}: ${value}`, { field, value });
  }
  return getAddress(value);
}
