/**
 * Tests for the plain graph views.
 */

import { describe, it, expect } from "vitest";
import { isPayment } from "@debtgraph/types";
import { buildAdjacencyGraph } from "../src/graph-builder.js";
import { netBalances } from "../src/net-balances.js";
import { graphToRecord, toPayments, totalsToRecord } from "../src/format.js";
import { DUPLICATE_PAIRS, SINGLE_RECEIVER } from "./fixtures.js";

describe("toPayments", () => {
  it("lists positive adjacency edges as pairwise debts", () => {
    expect(toPayments(buildAdjacencyGraph(DUPLICATE_PAIRS))).toEqual([
      { from: "Kevin", to: "John", amount: "12.00" },
      { from: "Xander", to: "Kevin", amount: "15.00" },
    ]);
  });

  it("skips zero edges", () => {
    const graph = buildAdjacencyGraph([
      { debtor: "A", payTo: "B", amount: 10 },
      { debtor: "B", payTo: "A", amount: 10 },
    ]);
    expect(toPayments(graph)).toEqual([]);
  });

  it("produces values that pass the payment guard", () => {
    for (const payment of toPayments(buildAdjacencyGraph(SINGLE_RECEIVER))) {
      expect(isPayment(payment)).toBe(true);
    }
  });
});

describe("graphToRecord", () => {
  it("formats every edge with the graph precision", () => {
    const graph = buildAdjacencyGraph([{ debtor: "A", payTo: "B", amount: 3 }], { decimals: 1 });
    expect(graphToRecord(graph)).toEqual({ A: { B: "3.0" }, B: { A: "-3.0" } });
  });

  it("serializes to JSON", () => {
    const graph = buildAdjacencyGraph([{ debtor: "A", payTo: "B", amount: 3 }]);
    expect(JSON.stringify(graphToRecord(graph))).toBe('{"A":{"B":"3.00"},"B":{"A":"-3.00"}}');
  });
});

describe("totalsToRecord", () => {
  it("formats every total", () => {
    const net = netBalances(buildAdjacencyGraph(SINGLE_RECEIVER));
    expect(totalsToRecord(net)).toEqual({
      Kevin: "762.50",
      Xander: "-2320.00",
      John: "830.00",
      William: "727.50",
    });
  });
});
