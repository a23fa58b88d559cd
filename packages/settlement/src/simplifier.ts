/**
 * @debtgraph/settlement — Greedy debt simplification.
 *
 * Turns net balances into a payment plan by walking net debtors
 * ("givers") and net creditors ("receivers") with two cursors and
 * transferring the smaller remaining amount each step.
 *
 * The plan preserves everyone's net position exactly. It does NOT
 * minimise the number of payments: one large giver may end up paying
 * many small receivers even when a shorter plan exists.
 */

import type { PersonId } from "@debtgraph/types";
import { minAmount } from "./amount-math.js";
import { updateBalance } from "./balance-update.js";
import { resolveOptions } from "./config.js";
import { netBalances } from "./net-balances.js";
import type {
  BalanceGraph,
  MutableBalanceRows,
  PersonOrdering,
  SimplifiedGraph,
  SimplifyOptions,
} from "./types.js";
import { MalformedGraphError } from "./types.js";

/**
 * A giver or receiver with what is still left to pay or receive.
 */
interface Party {
  readonly person: PersonId;
  remaining: bigint;
}

/**
 * Line people up for matching.
 *
 * - insertion: keep graph order (first appearance in the transactions)
 * - lexicographic: ascending code-unit order
 */
export function orderPeople(
  people: readonly PersonId[],
  ordering: PersonOrdering,
): PersonId[] {
  if (ordering === "insertion") {
    return [...people];
  }
  return [...people].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Check the structural invariants the matching relies on.
 *
 * Throws MalformedGraphError on a self-loop, an edge whose counterpart
 * has no row, or an edge that is not the negation of its reverse.
 */
export function assertWellFormedGraph(graph: BalanceGraph): void {
  for (const [person, row] of graph.balances) {
    for (const [other, amount] of row) {
      if (other === person) {
        throw new MalformedGraphError(`Self-loop on "${person}"`);
      }

      const counterpart = graph.balances.get(other);
      if (counterpart === undefined) {
        throw new MalformedGraphError(
          `"${person}" has an edge to "${other}", who has no row`,
        );
      }

      const reverse = counterpart.get(person);
      if (reverse !== -amount) {
        throw new MalformedGraphError(
          `Edge "${person}" -> "${other}" is ${amount.toString()} but the reverse is ${reverse === undefined ? "missing" : reverse.toString()}`,
        );
      }
    }
  }
}

/**
 * Produce the simplified payment graph for a balance graph.
 *
 * People with a zero total take part in no payment. When a giver and a
 * receiver run out in the same step, both cursors advance.
 */
export function simplify(
  graph: BalanceGraph,
  options?: SimplifyOptions,
): SimplifiedGraph {
  const { ordering, logger } = resolveOptions(options);

  assertWellFormedGraph(graph);
  const net = netBalances(graph);

  const givers: Party[] = [];
  const receivers: Party[] = [];

  for (const person of orderPeople(net.people, ordering)) {
    const total = net.totals.get(person) ?? 0n;
    if (total > 0n) {
      givers.push({ person, remaining: total });
    } else if (total < 0n) {
      receivers.push({ person, remaining: -total });
    }
  }

  const rows: MutableBalanceRows = new Map();
  let giverIndex = 0;
  let receiverIndex = 0;
  let payments = 0;

  // Invariant: the unmatched giver tail sums to the unmatched receiver tail.
  while (receiverIndex < receivers.length) {
    const giver = givers[giverIndex];
    const receiver = receivers[receiverIndex];
    if (giver === undefined || receiver === undefined) {
      throw new MalformedGraphError(
        "Net balances do not sum to zero: receivers remain after every giver has paid",
      );
    }

    const amount = minAmount(giver.remaining, receiver.remaining);
    updateBalance(rows, giver.person, receiver.person, amount);
    payments++;

    giver.remaining -= amount;
    receiver.remaining -= amount;

    if (giver.remaining === 0n) giverIndex++;
    if (receiver.remaining === 0n) receiverIndex++;
  }

  logger.debug(
    {
      people: net.people.length,
      givers: givers.length,
      receivers: receivers.length,
      payments,
      ordering,
    },
    "simplified",
  );

  return { kind: "simplified", decimals: graph.decimals, balances: rows };
}
