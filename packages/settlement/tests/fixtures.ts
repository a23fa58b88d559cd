/**
 * Shared transaction lists for the settlement tests.
 */

import type { Transaction } from "@debtgraph/types";

/** Four people, everyone but Xander ends up a net debtor. */
export const SINGLE_RECEIVER: readonly Transaction[] = [
  { debtor: "Kevin", payTo: "Xander", amount: 800 },
  { debtor: "John", payTo: "Xander", amount: 750 },
  { debtor: "William", payTo: "Xander", amount: 800 },
  { debtor: "Xander", payTo: "Kevin", amount: 30 },
  { debtor: "Kevin", payTo: "Xander", amount: 20 },
  { debtor: "John", payTo: "William", amount: 100 },
  { debtor: "William", payTo: "Kevin", amount: 40 },
  { debtor: "Xander", payTo: "John", amount: 20 },
  { debtor: "Kevin", payTo: "William", amount: 12.5 },
];

/** Same four people, with Xander and William both net creditors. */
export const MULTIPLE_RECEIVERS: readonly Transaction[] = [
  { debtor: "Kevin", payTo: "Xander", amount: 800 },
  { debtor: "John", payTo: "Xander", amount: 750 },
  { debtor: "John", payTo: "William", amount: 700 },
  { debtor: "Kevin", payTo: "William", amount: 800 },
  { debtor: "Xander", payTo: "Kevin", amount: 30 },
  { debtor: "Kevin", payTo: "Xander", amount: 20 },
  { debtor: "John", payTo: "William", amount: 100 },
  { debtor: "William", payTo: "Kevin", amount: 40 },
  { debtor: "Xander", payTo: "John", amount: 20 },
  { debtor: "Kevin", payTo: "William", amount: 12.5 },
];

/** Repeated debts in both directions between the same pairs. */
export const DUPLICATE_PAIRS: readonly Transaction[] = [
  { debtor: "Kevin", payTo: "Xander", amount: 50 },
  { debtor: "Kevin", payTo: "Xander", amount: 30 },
  { debtor: "Xander", payTo: "Kevin", amount: 20 },
  { debtor: "Xander", payTo: "Kevin", amount: 75 },
  { debtor: "John", payTo: "Kevin", amount: 10 },
  { debtor: "John", payTo: "Kevin", amount: 14 },
  { debtor: "Kevin", payTo: "John", amount: 29 },
  { debtor: "Kevin", payTo: "John", amount: 7 },
];
