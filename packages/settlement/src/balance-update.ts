/**
 * @debtgraph/settlement — Balance update primitive.
 *
 * The only write operation on a graph under construction. Both the graph
 * builder and the simplifier accumulate through it, so antisymmetry holds
 * after every call.
 */

import type { PersonId } from "@debtgraph/types";
import type { MutableBalanceRows } from "./types.js";
import { MalformedGraphError } from "./types.js";

function ensureRow(
  rows: MutableBalanceRows,
  person: PersonId,
): Map<PersonId, bigint> {
  let row = rows.get(person);
  if (row === undefined) {
    row = new Map();
    rows.set(person, row);
  }
  return row;
}

/**
 * Record that `debtor` additionally owes `payTo` the given amount.
 *
 * Creates missing rows, then either initializes the edge pair
 * (`amount` / `-amount`) or accumulates into it. A negative amount
 * shifts the balance the other way.
 *
 * Throws MalformedGraphError for a self-loop or an edge present in
 * only one direction.
 */
export function updateBalance(
  rows: MutableBalanceRows,
  debtor: PersonId,
  payTo: PersonId,
  amount: bigint,
): void {
  if (debtor === payTo) {
    throw new MalformedGraphError(`Cannot record a balance from "${debtor}" to itself`);
  }

  const debtorRow = ensureRow(rows, debtor);
  const payToRow = ensureRow(rows, payTo);

  const forward = debtorRow.get(payTo);
  const reverse = payToRow.get(debtor);

  if (forward === undefined && reverse === undefined) {
    debtorRow.set(payTo, amount);
    payToRow.set(debtor, -amount);
    return;
  }

  if (forward === undefined || reverse === undefined) {
    throw new MalformedGraphError(
      `Edge between "${debtor}" and "${payTo}" is present in one direction only`,
    );
  }

  debtorRow.set(payTo, forward + amount);
  payToRow.set(debtor, reverse - amount);
}
