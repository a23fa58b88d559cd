/**
 * Settlement Types
 *
 * Primitives exchanged with callers of the settlement engine.
 *
 * Rules:
 * - Amounts crossing the boundary are plain numbers or decimal strings
 * - Amounts leaving the engine are always decimal strings
 * - Person identifiers are opaque; equality is string equality
 */

/**
 * Opaque identifier of a participant (e.g. a name or user ID).
 * Must be non-empty.
 */
export type PersonId = string;

/**
 * An amount as supplied by a caller.
 * Either a finite number (`12.5`) or a decimal string (`"12.50"`).
 */
export type AmountInput = number | string;

/**
 * A single debt: `debtor` owes `payTo` the given amount.
 */
export interface Transaction {
  /** The person who owes money */
  readonly debtor: PersonId;

  /** The person who is owed */
  readonly payTo: PersonId;

  /** Strictly positive amount owed */
  readonly amount: AmountInput;
}

/**
 * One payment of a settlement plan: `from` pays `to` the amount.
 */
export interface Payment {
  readonly from: PersonId;
  readonly to: PersonId;
  /** Decimal string, always positive (e.g. "762.50") */
  readonly amount: string;
}
