/**
 * Input schemas with Zod validation.
 *
 * For transaction lists arriving from outside the process (JSON files,
 * request bodies). Range checks that depend on precision happen in the
 * graph builder.
 */

import { z } from "zod";
import type { Transaction } from "@debtgraph/types";

export const TransactionSchema = z.object({
  debtor: z.string().min(1),
  payTo: z.string().min(1),
  amount: z.union([
    z.number().finite().positive(),
    z
      .string()
      .regex(/^\d+(\.\d+)?$/, "Amount must be a positive decimal string")
      .refine((amount) => /[1-9]/.test(amount), "Amount must be a positive decimal string"),
  ]),
});

export const TransactionListSchema = z.array(TransactionSchema);

/**
 * Validate untrusted input into a transaction list.
 *
 * @throws {z.ZodError} if the input does not match the schema
 */
export function parseTransactions(input: unknown): Transaction[] {
  return TransactionListSchema.parse(input);
}
