// ============================================
// Common Package Entry
// ============================================

export * from "./types/events.js";
export * from "./utils/logger.js";
export * from "./utils/config.js";
export * from "./utils/errors.js";
export * from "./utils/db.js";
export * from "./utils/redis.js";
