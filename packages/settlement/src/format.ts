/**
 * @debtgraph/settlement — Plain views of graphs for callers.
 *
 * Converts bigint graphs into decimal-string records and payment
 * lists that serialize to JSON as-is.
 */

import type { Payment, PersonId } from "@debtgraph/types";
import { formatAmount } from "./amount-math.js";
import type { BalanceGraph, NetBalances } from "./types.js";

/**
 * Every positive edge as a payment, in row order then column order.
 *
 * On a simplified graph this is the payment plan. On an adjacency
 * graph it lists who owes whom after pairwise netting.
 */
export function toPayments(graph: BalanceGraph): Payment[] {
  const payments: Payment[] = [];

  for (const [from, row] of graph.balances) {
    for (const [to, amount] of row) {
      if (amount > 0n) {
        payments.push({ from, to, amount: formatAmount(amount, graph.decimals) });
      }
    }
  }

  return payments;
}

export function graphToRecord(
  graph: BalanceGraph,
): Record<PersonId, Record<PersonId, string>> {
  const record: Record<PersonId, Record<PersonId, string>> = {};

  for (const [person, row] of graph.balances) {
    const formatted: Record<PersonId, string> = {};
    for (const [other, amount] of row) {
      formatted[other] = formatAmount(amount, graph.decimals);
    }
    record[person] = formatted;
  }

  return record;
}

export function totalsToRecord(net: NetBalances): Record<PersonId, string> {
  const record: Record<PersonId, string> = {};
  for (const [person, total] of net.totals) {
    record[person] = formatAmount(total, net.decimals);
  }
  return record;
}
