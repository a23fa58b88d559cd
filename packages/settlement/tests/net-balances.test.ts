/**
 * Tests for net balance computation.
 */

import { describe, it, expect } from "vitest";
import { buildAdjacencyGraph } from "../src/graph-builder.js";
import { netBalances } from "../src/net-balances.js";
import { sumAmounts } from "../src/amount-math.js";
import { graphToRecord } from "../src/format.js";
import type { AdjacencyGraph } from "../src/types.js";
import { DUPLICATE_PAIRS, MULTIPLE_RECEIVERS, SINGLE_RECEIVER } from "./fixtures.js";

describe("netBalances", () => {
  it("computes totals for the single-receiver list", () => {
    const net = netBalances(buildAdjacencyGraph(SINGLE_RECEIVER));

    expect(net.people).toEqual(["Kevin", "Xander", "John", "William"]);
    expect(net.totals).toEqual(
      new Map([
        ["Kevin", 76250n],
        ["Xander", -232000n],
        ["John", 83000n],
        ["William", 72750n],
      ]),
    );
  });

  it("computes totals for duplicate pairs", () => {
    const net = netBalances(buildAdjacencyGraph(DUPLICATE_PAIRS));

    expect(net.totals.get("Kevin")).toBe(-300n);
    expect(net.totals.get("Xander")).toBe(1500n);
    expect(net.totals.get("John")).toBe(-1200n);
  });

  it("computes totals for the multiple-receiver list", () => {
    const net = netBalances(buildAdjacencyGraph(MULTIPLE_RECEIVERS));

    expect(net.totals.get("Kevin")).toBe(156250n);
    expect(net.totals.get("Xander")).toBe(-152000n);
    expect(net.totals.get("John")).toBe(153000n);
    expect(net.totals.get("William")).toBe(-157250n);
  });

  it("conserves money: totals sum to zero", () => {
    for (const list of [SINGLE_RECEIVER, MULTIPLE_RECEIVERS, DUPLICATE_PAIRS]) {
      const net = netBalances(buildAdjacencyGraph(list));
      expect(sumAmounts(net.totals.values())).toBe(0n);
    }
  });

  it("reports zero for a settled pair", () => {
    const net = netBalances(
      buildAdjacencyGraph([
        { debtor: "A", payTo: "B", amount: 10 },
        { debtor: "B", payTo: "A", amount: 10 },
      ]),
    );
    expect(net.totals).toEqual(new Map([["A", 0n], ["B", 0n]]));
  });

  it("gives zero to a person with an empty row", () => {
    const graph: AdjacencyGraph = {
      kind: "adjacency",
      decimals: 2,
      balances: new Map([["loner", new Map<string, bigint>()]]),
    };
    expect(netBalances(graph).totals.get("loner")).toBe(0n);
  });

  it("carries the graph precision", () => {
    const net = netBalances(buildAdjacencyGraph([], { decimals: 6 }));
    expect(net.decimals).toBe(6);
    expect(net.people).toEqual([]);
  });

  it("does not modify the graph", () => {
    const graph = buildAdjacencyGraph(SINGLE_RECEIVER);
    const before = graphToRecord(graph);

    netBalances(graph);

    expect(graphToRecord(graph)).toEqual(before);
  });
});
