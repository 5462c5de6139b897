/**
 * @stakeline/shared
 * Shared logger, schemas, constants, errors and checked arithmetic
 */

// Export schemas (includes env schema and operation inputs)
export * from "./schemas/index.js";

// Export constants (TIMING, FEES, INITIAL_STAGE_SCHEDULE, etc.)
export * from "./constants/index.js";

// Export error taxonomy
export * from "./errors/index.js";

// Export checked u64 arithmetic
export * from "./math/checked.js";

// Export logger
export {
  logger,
  createServiceLogger,
  presaleLogger,
  logLedgerMovement,
  audit,
  logError,
} from "./logger/index.js";

export type { AuditLogEntry, LedgerLogContext } from "./logger/index.js";
