/**
 * @debtgraph/settlement — Adjacency graph builder.
 *
 * Folds a flat transaction list into net pairwise balances.
 *
 * Rules:
 * - Every transaction is validated before the graph is touched
 * - People get a row in order of first appearance (debtor before payTo)
 * - Repeated transactions between a pair collapse into one net edge
 */

import type { PersonId, Transaction } from "@debtgraph/types";
import { isPersonId } from "@debtgraph/types";
import { toScaledAmount } from "./amount-math.js";
import { updateBalance } from "./balance-update.js";
import { resolveOptions } from "./config.js";
import type {
  AdjacencyGraph,
  BuildOptions,
  MutableBalanceRows,
} from "./types.js";
import { InvalidTransactionError, SettlementError } from "./types.js";

interface ScaledTransaction {
  readonly debtor: PersonId;
  readonly payTo: PersonId;
  readonly amount: bigint;
}

/**
 * Validate one transaction and scale its amount.
 *
 * Validation rules (fail-closed — all must pass):
 * 1. debtor and payTo are non-empty strings
 * 2. debtor and payTo differ
 * 3. amount parses at the configured precision
 * 4. amount is strictly positive
 */
function scaleTransaction(
  tx: Transaction,
  index: number,
  decimals: number,
): ScaledTransaction {
  if (!isPersonId(tx.debtor) || !isPersonId(tx.payTo)) {
    throw new InvalidTransactionError(
      "INVALID_PERSON",
      index,
      `Transaction ${String(index)}: debtor and payTo must be non-empty strings`,
    );
  }

  if (tx.debtor === tx.payTo) {
    throw new InvalidTransactionError(
      "SELF_TRANSACTION",
      index,
      `Transaction ${String(index)}: "${tx.debtor}" cannot owe themselves`,
    );
  }

  let amount: bigint;
  try {
    amount = toScaledAmount(tx.amount, decimals);
  } catch (err) {
    if (err instanceof SettlementError) {
      throw new InvalidTransactionError(
        "INVALID_AMOUNT",
        index,
        `Transaction ${String(index)}: ${err.message}`,
      );
    }
    throw err;
  }

  if (amount <= 0n) {
    throw new InvalidTransactionError(
      "NON_POSITIVE_AMOUNT",
      index,
      `Transaction ${String(index)}: amount must be positive, got "${String(tx.amount)}"`,
    );
  }

  return { debtor: tx.debtor, payTo: tx.payTo, amount };
}

/**
 * Build the undirected, antisymmetric graph of net pairwise balances.
 *
 * A person who appears in no transaction has no row. An edge whose
 * transactions cancel out stays in the graph with weight 0n.
 *
 * Throws InvalidTransactionError on the first invalid transaction.
 */
export function buildAdjacencyGraph(
  transactions: readonly Transaction[],
  options?: BuildOptions,
): AdjacencyGraph {
  const { decimals, logger } = resolveOptions(options);

  const scaled = transactions.map((tx, index) => scaleTransaction(tx, index, decimals));

  const rows: MutableBalanceRows = new Map();
  for (const tx of scaled) {
    for (const person of [tx.debtor, tx.payTo]) {
      if (!rows.has(person)) {
        rows.set(person, new Map());
      }
    }
  }

  for (const tx of scaled) {
    updateBalance(rows, tx.debtor, tx.payTo, tx.amount);
  }

  logger.debug(
    { transactions: transactions.length, people: rows.size },
    "graph built",
  );

  return { kind: "adjacency", decimals, balances: rows };
}
