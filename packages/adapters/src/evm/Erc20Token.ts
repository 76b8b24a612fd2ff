// ============================================
// ERC20 Token Adapters
//
// The wallet client's account is the engine's custody:
// it spends user allowances, pays out collateral and
// is the pegged token's minter.
// ============================================

import {
  erc20Abi,
  type Account,
  type Address,
  type Chain,
  type Hash,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";
import { createLogger } from "@pegmint/common";
import { toAddress, type CollateralToken, type PeggedToken } from "@pegmint/engine";
import { PEGGED_TOKEN_ABI } from "./abis.js";

const logger = createLogger("adapters:erc20");

export type CustodyWallet = WalletClient<Transport, Chain, Account>;

export interface Erc20Clients {
  publicClient: PublicClient;
  walletClient: CustodyWallet;
}

export class Erc20CollateralToken implements CollateralToken {
  readonly address: Address;
  protected readonly publicClient: PublicClient;
  protected readonly walletClient: CustodyWallet;

  constructor(address: string, clients: Erc20Clients) {
    this.address = toAddress(address, "token");
    this.publicClient = clients.publicClient;
    this.walletClient = clients.walletClient;
  }

  async transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean> {
    const hash = await this.walletClient.writeContract({
      address: this.address,
      abi: erc20Abi,
      functionName: "transferFrom",
      args: [from, to, amount],
    });
    return this.confirm(hash, "transferFrom", { from, to, amount });
  }

  async transfer(to: Address, amount: bigint): Promise<boolean> {
    const hash = await this.walletClient.writeContract({
      address: this.address,
      abi: erc20Abi,
      functionName: "transfer",
      args: [to, amount],
    });
    return this.confirm(hash, "transfer", { to, amount });
  }

  /** Wait for inclusion; a reverted receipt reports `false`. */
  protected async confirm(hash: Hash, action: string, meta: Record<string, unknown>): Promise<boolean> {
    const receipt = await this.publicClient.waitForTransactionReceipt({ hash });
    const ok = receipt.status === "success";
    if (ok) {
      logger.info(`${action} confirmed`, { token: this.address, hash, block: receipt.blockNumber, ...meta });
    } else {
      logger.warn(`${action} reverted`, { token: this.address, hash, ...meta });
    }
    return ok;
  }
}

export class Erc20PeggedToken extends Erc20CollateralToken implements PeggedToken {
  async mint(to: Address, amount: bigint): Promise<boolean> {
    const hash = await this.walletClient.writeContract({
      address: this.address,
      abi: PEGGED_TOKEN_ABI,
      functionName: "mint",
      args: [to, amount],
    });
    return this.confirm(hash, "mint", { to, amount });
  }

  async burn(amount: bigint): Promise<void> {
    const hash = await this.walletClient.writeContract({
      address: this.address,
      abi: PEGGED_TOKEN_ABI,
      functionName: "burn",
      args: [amount],
    });
    if (!(await this.confirm(hash, "burn", { amount }))) {
      throw new Error(`burn of ${amount} reverted in ${hash}`);
    }
  }
}
