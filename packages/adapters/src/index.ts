// ============================================
// Adapters Package Entry
// ============================================

export { AGGREGATOR_V3_ABI, PEGGED_TOKEN_ABI } from "./evm/abis.js";
export { ChainlinkPriceFeed } from "./evm/ChainlinkPriceFeed.js";
export {
  Erc20CollateralToken,
  Erc20PeggedToken,
  type CustodyWallet,
  type Erc20Clients,
} from "./evm/Erc20Token.js";
export { QueueEventSink, toEventJob, type EventQueue } from "./events/QueueEventSink.js";
export {
  PositionSnapshotter,
  type PositionSnapshot,
  type PositionSource,
  type SnapshotResult,
} from "./persistence/PositionSnapshotter.js";
export { createEngineFromConfig, type CreateEngineOptions, type EngineRuntime } from "./factory.js";
