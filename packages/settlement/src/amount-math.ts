/**
 * @debtgraph/settlement — Deterministic amount arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Caller amounts are converted to bigint minor units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations after parsing
 * - Amounts must be valid decimal strings or finite numbers
 * - Zero runtime dependencies
 */

import type { AmountInput } from "@debtgraph/types";
import { SettlementError } from "./types.js";

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new SettlementError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new SettlementError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new SettlementError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Shortest round-trip decimal form of a finite number, without an
 * exponent: 1e-7 → "0.0000001", 1.5e21 → "1500000000000000000000".
 */
function toPlainDecimal(amount: number): string {
  const str = String(amount);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(str);
  if (match === null) {
    return str;
  }

  const [, sign = "", lead = "", frac = "", exp = "0"] = match;
  const digits = lead + frac;
  const point = 1 + Number(exp);

  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return sign + digits + "0".repeat(point - digits.length);
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Scale a caller-supplied amount.
 *
 * Numbers go through their shortest round-trip decimal form, so `12.5`
 * parses like `"12.5"` and `1e-7` like `"0.0000001"`.
 */
export function toScaledAmount(amount: AmountInput, decimals: number): bigint {
  if (typeof amount === "number") {
    if (!Number.isFinite(amount)) {
      throw new SettlementError("INVALID_AMOUNT", `Amount must be a finite number, got: ${String(amount)}`);
    }
    return parseAmount(toPlainDecimal(amount), decimals);
  }
  return parseAmount(amount, decimals);
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}
