// ============================================
// Engine Wiring from Configuration
// ============================================

import { createPublicClient, createWalletClient, defineChain, http, type PublicClient } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { closeDbPool, closeRedis, createLogger, createQueue, query, type AppConfig } from "@pegmint/common";
import { FEED_PRECISION, StablecoinEngine, type EventSink } from "@pegmint/engine";
import { ChainlinkPriceFeed } from "./evm/ChainlinkPriceFeed.js";
import { Erc20CollateralToken, Erc20PeggedToken, type CustodyWallet } from "./evm/Erc20Token.js";
import { QueueEventSink } from "./events/QueueEventSink.js";
import { PositionSnapshotter } from "./persistence/PositionSnapshotter.js";

const logger = createLogger("adapters:factory");

const FEED_DECIMALS = FEED_PRECISION.toString().length - 1;

export interface EngineRuntime {
  engine: StablecoinEngine;
  snapshotter: PositionSnapshotter;
  publicClient: PublicClient;
  walletClient: CustodyWallet;
  /** Close the Postgres pool and the Redis connection. */
  close(): Promise<void>;
}

export interface CreateEngineOptions {
  /** Defaults to a BullMQ queue named by `config.events.queueName`. */
  eventSink?: EventSink;
}

function parsePrivateKey(value: string | undefined): `0x${string}` {
  if (!value) throw new Error("ENGINE_PRIVATE_KEY is required to operate the engine");
  const key = value.startsWith("0x") ? value.slice(2) : value;
  if (!/^[0-9a-fA-F]{64}$/.test(key)) throw new Error("ENGINE_PRIVATE_KEY must be 32 bytes of hex");
  return `0x${key}`;
}

/** Build an engine whose tokens and feeds live on the configured EVM chain. */
export async function createEngineFromConfig(
  config: AppConfig,
  options: CreateEngineOptions = {}
): Promise<EngineRuntime> {
  const chain = defineChain({
    id: config.chain.chainId,
    name: `chain-${config.chain.chainId}`,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: [config.chain.rpcUrl] } },
  });

  const account = privateKeyToAccount(parsePrivateKey(config.engine.operatorPrivateKey));
  const publicClient = createPublicClient({ chain, transport: http(config.chain.rpcUrl) });
  const walletClient = createWalletClient({ account, chain, transport: http(config.chain.rpcUrl) });

  const custody = config.engine.custody || account.address;
  if (custody.toLowerCase() !== account.address.toLowerCase()) {
    throw new Error(`Custody ${custody} must be the operator account ${account.address}`);
  }

  const clients = { publicClient, walletClient };
  const collateralTokens = config.engine.collateralTokens.map((address) => new Erc20CollateralToken(address, clients));
  const priceFeeds = config.engine.priceFeeds.map((address) => new ChainlinkPriceFeed(address, publicClient));

  for (const feed of priceFeeds) {
    const decimals = await feed.decimals();
    if (decimals !== FEED_DECIMALS) {
      throw new Error(`Price feed ${feed.address} reports ${decimals} decimals, expected ${FEED_DECIMALS}`);
    }
  }

  const engine = new StablecoinEngine({
    collateralTokens,
    priceFeeds,
    peggedToken: new Erc20PeggedToken(config.engine.peggedToken, clients),
    custody,
    oracleTimeoutSeconds: config.engine.oracleTimeoutSeconds,
    eventSink: options.eventSink ?? new QueueEventSink(createQueue(config.events.queueName)),
  });

  logger.info("Engine connected", { chainId: chain.id, custody, assets: engine.getCollateralAssets() });
  return {
    engine,
    snapshotter: new PositionSnapshotter(engine, query),
    publicClient,
    walletClient,
    close: async () => {
      await Promise.all([closeDbPool(), closeRedis()]);
    },
  };
}
