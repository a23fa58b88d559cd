/**
 * @debtgraph/settlement — Internal types for the settlement engine.
 *
 * These extend the shared @debtgraph/types with graph structures
 * used only within this package.
 *
 * Rules:
 * - All amounts are bigint minor units scaled by the graph's decimals
 * - Graphs returned to callers are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { PersonId, Payment } from "@debtgraph/types";
import type { Logger } from "pino";

// ─── Graph Types ─────────────────────────────────────────────────────────

/**
 * Signed pairwise balances: `rows.get(a)?.get(b)` is a's balance toward b.
 */
export type BalanceRows = ReadonlyMap<PersonId, ReadonlyMap<PersonId, bigint>>;

/**
 * The accumulator owned by whichever routine is building a graph.
 * Never exposed once construction finishes.
 */
export type MutableBalanceRows = Map<PersonId, Map<PersonId, bigint>>;

/**
 * Fields shared by every graph shape.
 */
export interface BalanceGraph {
  /** Number of fractional digits the bigint amounts are scaled by. */
  readonly decimals: number;
  readonly balances: BalanceRows;
}

/**
 * Undirected net pairwise balances built from a transaction list.
 *
 * Invariants:
 * - `balances[a][b] === -balances[b][a]` for every edge
 * - Every person seen in any transaction has a row (possibly empty)
 * - No self-loops
 */
export interface AdjacencyGraph extends BalanceGraph {
  readonly kind: "adjacency";
}

/**
 * Directed payment plan: a positive `balances[a][b]` means a pays b.
 * The reverse edge carries the negated amount.
 */
export interface SimplifiedGraph extends BalanceGraph {
  readonly kind: "simplified";
}

/**
 * Every person's position against a hypothetical central clearing node.
 */
export interface NetBalances {
  readonly decimals: number;
  /** Graph keys in graph order. */
  readonly people: readonly PersonId[];
  /** Positive = net debtor, negative = net creditor, zero = settled. */
  readonly totals: ReadonlyMap<PersonId, bigint>;
}

/**
 * Everything the settlement pipeline computes for one transaction list.
 */
export interface SettlementResult {
  readonly graph: AdjacencyGraph;
  readonly net: NetBalances;
  readonly simplified: SimplifiedGraph;
  readonly payments: readonly Payment[];
}

// ─── Options ─────────────────────────────────────────────────────────────

/**
 * How givers and receivers are lined up before greedy matching.
 *
 * - insertion: order of first appearance in the transaction list
 * - lexicographic: ascending code-unit order of the person ID
 */
export type PersonOrdering = "insertion" | "lexicographic";

/**
 * Per-call overrides. Anything omitted falls back to the loaded config.
 */
export interface SettlementOptions {
  readonly decimals?: number | undefined;
  readonly ordering?: PersonOrdering | undefined;
  readonly logger?: Logger | undefined;
}

export type BuildOptions = Pick<SettlementOptions, "decimals" | "logger">;

export type SimplifyOptions = Pick<SettlementOptions, "ordering" | "logger">;

export interface ResolvedSettlementOptions {
  readonly decimals: number;
  readonly ordering: PersonOrdering;
  readonly logger: Logger;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for settlement operations. */
export type SettlementErrorCode =
  | "INVALID_AMOUNT"
  | "NON_POSITIVE_AMOUNT"
  | "SELF_TRANSACTION"
  | "INVALID_PERSON"
  | "MALFORMED_GRAPH";

export type InvalidTransactionCode = Exclude<SettlementErrorCode, "MALFORMED_GRAPH">;

/**
 * Structured error from the settlement engine.
 * Always thrown — never returns error codes silently.
 */
export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;

  constructor(code: SettlementErrorCode, message: string) {
    super(message);
    this.name = "SettlementError";
    this.code = code;
  }
}

/**
 * A transaction that cannot enter the graph.
 * `index` is the position of the offending transaction in the input list.
 */
export class InvalidTransactionError extends SettlementError {
  public readonly index: number;

  constructor(code: InvalidTransactionCode, index: number, message: string) {
    super(code, message);
    this.name = "InvalidTransactionError";
    this.index = index;
  }
}

/**
 * A graph that breaks antisymmetry, has a self-loop, or references a
 * person without a row.
 */
export class MalformedGraphError extends SettlementError {
  constructor(message: string) {
    super("MALFORMED_GRAPH", message);
    this.name = "MalformedGraphError";
  }
}
