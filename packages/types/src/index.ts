/**
 * @debtgraph/types — Shared domain types for the debtgraph stack.
 *
 * - Participants and the debts between them
 * - Payments of a settlement plan
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

export type {
  PersonId,
  AmountInput,
  Transaction,
  Payment,
} from "./settlement.js";

// Runtime type guards
export {
  isPersonId,
  isAmountInput,
  isTransaction,
  isPayment,
} from "./guards.js";
