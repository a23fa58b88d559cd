/**
 * @debtgraph/settlement — Net balance computation.
 *
 * Summing a person's signed pairwise edges gives their debt to a
 * hypothetical central clearing node; cycles cancel out on the way.
 * For any graph built from transactions the totals sum to exactly 0n.
 */

import type { PersonId } from "@debtgraph/types";
import { sumAmounts } from "./amount-math.js";
import type { BalanceGraph, NetBalances } from "./types.js";

/**
 * Compute every person's net total. Pure read of the graph.
 */
export function netBalances(graph: BalanceGraph): NetBalances {
  const people: PersonId[] = [];
  const totals = new Map<PersonId, bigint>();

  for (const [person, row] of graph.balances) {
    people.push(person);
    totals.set(person, sumAmounts(row.values()));
  }

  return { decimals: graph.decimals, people, totals };
}
