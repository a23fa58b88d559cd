/**
 * @debtgraph/settlement — End-to-end settlement pipeline.
 *
 * transactions → adjacency graph → net balances → simplified graph → payments
 */

import type { Transaction } from "@debtgraph/types";
import { resolveOptionsFromEnv } from "./config.js";
import { toPayments } from "./format.js";
import { buildAdjacencyGraph } from "./graph-builder.js";
import { netBalances } from "./net-balances.js";
import { simplify } from "./simplifier.js";
import type { SettlementOptions, SettlementResult } from "./types.js";

/**
 * Run every stage with one resolved option set. Options left out are
 * taken from the environment (see `loadConfig`).
 */
export function settle(
  transactions: readonly Transaction[],
  options?: SettlementOptions,
): SettlementResult {
  const resolved = resolveOptionsFromEnv(options);

  const graph = buildAdjacencyGraph(transactions, resolved);
  const net = netBalances(graph);
  const simplified = simplify(graph, resolved);

  return { graph, net, simplified, payments: toPayments(simplified) };
}
