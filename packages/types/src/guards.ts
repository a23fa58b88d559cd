/**
 * Runtime Type Guards
 *
 * Narrowing functions for settlement domain types.
 * These enable safe runtime validation at system boundaries
 * (deserialized data, caller input, external integrations).
 */

import type { AmountInput, Payment, PersonId, Transaction } from "./settlement.js";

const DECIMAL_STRING = /^-?\d+(\.\d+)?$/;

export function isPersonId(value: unknown): value is PersonId {
  return typeof value === "string" && value.length > 0;
}

export function isAmountInput(value: unknown): value is AmountInput {
  if (typeof value === "number") return Number.isFinite(value);
  return typeof value === "string" && DECIMAL_STRING.test(value.trim());
}

export function isTransaction(value: unknown): value is Transaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isPersonId(v.debtor) &&
    isPersonId(v.payTo) &&
    isAmountInput(v.amount)
  );
}

export function isPayment(value: unknown): value is Payment {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isPersonId(v.from) &&
    isPersonId(v.to) &&
    typeof v.amount === "string" &&
    DECIMAL_STRING.test(v.amount)
  );
}
