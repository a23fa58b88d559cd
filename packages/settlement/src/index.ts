/**
 * @debtgraph/settlement — Pairwise debt settlement engine.
 *
 * Turns a list of "A owes B" transactions into a short payment plan:
 * - Aggregate transactions into net pairwise balances
 * - Compute each person's net position
 * - Greedily match net debtors to net creditors
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Results are readonly once returned
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Deterministic: the same input and ordering give the same plan
 */

// Pipeline
export { settle } from "./settle.js";

// Core operations
export { updateBalance } from "./balance-update.js";
export { buildAdjacencyGraph } from "./graph-builder.js";
export { netBalances } from "./net-balances.js";
export {
  simplify,
  orderPeople,
  assertWellFormedGraph,
} from "./simplifier.js";

// Presentation
export { toPayments, graphToRecord, totalsToRecord } from "./format.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  toScaledAmount,
  minAmount,
  sumAmounts,
} from "./amount-math.js";

// Input validation
export {
  TransactionSchema,
  TransactionListSchema,
  parseTransactions,
} from "./schemas.js";

// Configuration & logging
export {
  ConfigSchema,
  DEFAULT_CONFIG,
  SettlementOptionsSchema,
  loadConfig,
  resolveOptions,
  resolveOptionsFromEnv,
} from "./config.js";
export type { SettlementConfig } from "./config.js";
export { createLogger, getLogger } from "./logger.js";
export type { LogLevel } from "./logger.js";

// Types
export type {
  BalanceRows,
  MutableBalanceRows,
  BalanceGraph,
  AdjacencyGraph,
  SimplifiedGraph,
  NetBalances,
  SettlementResult,
  PersonOrdering,
  SettlementOptions,
  BuildOptions,
  SimplifyOptions,
  ResolvedSettlementOptions,
  SettlementErrorCode,
  InvalidTransactionCode,
} from "./types.js";

export {
  SettlementError,
  InvalidTransactionError,
  MalformedGraphError,
} from "./types.js";
