import { describe, it, expect } from "vitest";

import { SymbolGraph } from "../src/core/graph/SymbolGraph.js";
import { MalformedGraphError } from "../src/core/errors.js";
import type { ParsedFact } from "../src/core/model.js";
import { fact } from "./fakes.js";

function build(facts: ParsedFact[], externals: string[] = []): SymbolGraph {
  const result = SymbolGraph.build(facts, { externals });
  if (!result.ok) throw result.error;
  return result.value;
}

function ids(graph: SymbolGraph): string[] {
  return graph.order().map((u) => u.id);
}

describe("SymbolGraph", () => {
  describe("ordering", () => {
    it("puts every dependency before its dependents", () => {
      const graph = build([fact("A", ["B"]), fact("B", ["C"]), fact("C")]);
      expect(ids(graph)).toEqual(["C", "B", "A"]);
    });

    it("breaks ties by source order", () => {
      const graph = build([fact("zeta"), fact("alpha"), fact("mid", ["alpha"]), fact("beta")]);
      expect(ids(graph)).toEqual(["zeta", "alpha", "mid", "beta"]);
    });

    it("returns the same order on every call and every build", () => {
      const facts = [fact("A", ["B", "C"]), fact("B", ["D"]), fact("C", ["D"]), fact("D")];
      const graph = build(facts);
      expect(graph.order()).toBe(graph.order());
      expect(ids(build(facts))).toEqual(ids(graph));
      expect(ids(graph)).toEqual(["D", "B", "C", "A"]);
    });

    it("handles long chains without recursion limits", () => {
      const facts: ParsedFact[] = [];
      for (let i = 0; i < 10_000; i++) {
        facts.push(fact(`f${i}`, i + 1 < 10_000 ? [`f${i + 1}`] : []));
      }
      const graph = build(facts);
      expect(graph.unitCount).toBe(10_000);
      expect(graph.order()[0].id).toBe("f9999");
      expect(graph.order()[9999].id).toBe("f0");
    });
  });

  describe("cycles", () => {
    it("collapses a two-symbol cycle into one unit", () => {
      const graph = build([fact("X", ["Y"]), fact("Y", ["X"]), fact("W", ["X"])]);
      expect(ids(graph)).toEqual(["cycle:X+Y", "W"]);

      const unit = graph.unitOf("Y");
      expect(unit?.id).toBe("cycle:X+Y");
      expect(unit?.isCycle).toBe(true);
      expect(unit?.symbols.map((s) => s.name)).toEqual(["X", "Y"]);
      expect(graph.symbol("X")?.cycleId).toBe("cycle:X+Y");
      expect(graph.unit("W")?.dependencies).toEqual(["cycle:X+Y"]);
    });

    it("merges overlapping cycles", () => {
      const graph = build([fact("A", ["B"]), fact("B", ["A", "C"]), fact("C", ["B"])]);
      expect(ids(graph)).toEqual(["cycle:A+B+C"]);
      expect(graph.unit("cycle:A+B+C")?.symbols.map((s) => s.name)).toEqual(["A", "B", "C"]);
    });

    it("ignores the analyzer's cycle hint", () => {
      const hinted = { ...fact("solo"), isCycle: true };
      const graph = build([hinted]);
      expect(graph.unit("solo")?.isCycle).toBe(false);
      expect(graph.symbol("solo")?.cycleId).toBeNull();
    });

    it("does not turn a self-dependency into a cycle", () => {
      const graph = build([fact("node", ["node"], "struct")]);
      const symbol = graph.symbol("node");
      expect(symbol?.selfReferential).toBe(true);
      expect(symbol?.dependencies).toEqual([]);
      expect(graph.unit("node")?.isCycle).toBe(false);
    });
  });

  describe("validation", () => {
    it("reports every problem at once", () => {
      const result = SymbolGraph.build([fact("A", ["ghost"]), fact("B", ["phantom"])]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(MalformedGraphError);
      expect(result.error.problems).toEqual([
        '"A" depends on unknown symbol "ghost"',
        '"B" depends on unknown symbol "phantom"',
      ]);
      expect(result.error.message).toBe(
        'Malformed graph (2 problems):\n- "A" depends on unknown symbol "ghost"\n- "B" depends on unknown symbol "phantom"'
      );
    });

    it("rejects duplicate and empty names", () => {
      const result = SymbolGraph.build([fact("A"), fact(" "), fact("A")]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.problems).toEqual(["fact #1 has an empty name", 'duplicate symbol "A" (facts #0 and #2)']);
    });

    it("accepts declared externals without ordering on them", () => {
      const graph = build([fact("A", ["size_t", "B", "size_t"]), fact("B", ["FILE"])], ["size_t", "FILE"]);
      expect(ids(graph)).toEqual(["B", "A"]);
      expect(graph.unit("A")?.externalDependencies).toEqual(["size_t"]);
      expect(graph.unit("A")?.dependencies).toEqual(["B"]);
    });

    it("unions the externals of cycle members", () => {
      const graph = build([fact("X", ["Y", "u8"]), fact("Y", ["X", "u16"])], ["u8", "u16"]);
      expect(graph.unit("cycle:X+Y")?.externalDependencies).toEqual(["u8", "u16"]);
    });
  });

  describe("queries", () => {
    const graph = build([
      fact("C"),
      fact("B", ["C"]),
      fact("A", ["B"]),
      fact("D", ["C"]),
      fact("Point", [], "struct"),
    ]);

    it("lists direct and transitive dependents in processing order", () => {
      expect(graph.dependents("C")).toEqual(["B", "D"]);
      expect(graph.transitiveDependents("C")).toEqual(["B", "A", "D"]);
      expect(graph.transitiveDependents("A")).toEqual([]);
      expect(graph.hasDependents("B")).toBe(true);
      expect(graph.hasDependents("A")).toBe(false);
    });

    it("requires a differential test only for units with a function", () => {
      expect(graph.unit("A")?.requiresDifferentialTest).toBe(true);
      expect(graph.unit("Point")?.requiresDifferentialTest).toBe(false);
    });

    it("answers lookups for unknown names", () => {
      expect(graph.unit("nope")).toBeUndefined();
      expect(graph.unitOf("nope")).toBeUndefined();
      expect(graph.positionOf("nope")).toBe(-1);
      expect(graph.symbolCount).toBe(5);
    });
  });
});
