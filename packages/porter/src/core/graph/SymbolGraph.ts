/**
 * Symbol graph: resolved symbols, collapsed cycles and processing order.
 *
 * Built once per run from parsed facts and immutable afterwards.
 */

import type { Result } from "@portwright/core";
import { Ok, Err } from "@portwright/core";

import type { ParsedFact, PortSymbol, ProcessingUnit } from "../model.js";
import { MalformedGraphError } from "../errors.js";
import { stronglyConnectedComponents } from "./scc.js";

export interface GraphOptions {
  /** Names that may be referenced without being defined */
  externals?: Iterable<string>;
}

export const CYCLE_PREFIX = "cycle:";

export function cycleIdFor(names: Iterable<string>): string {
  return CYCLE_PREFIX + [...names].sort().join("+");
}

export class SymbolGraph {
  private readonly position = new Map<string, number>();
  private readonly reverse = new Map<string, string[]>();

  private constructor(
    private readonly symbols: ReadonlyMap<string, PortSymbol>,
    private readonly units: ReadonlyMap<string, ProcessingUnit>,
    private readonly unitBySymbol: ReadonlyMap<string, string>,
    private readonly ordered: readonly ProcessingUnit[]
  ) {
    ordered.forEach((unit, i) => {
      this.position.set(unit.id, i);
      this.reverse.set(unit.id, []);
    });
    for (const unit of ordered) {
      for (const dep of unit.dependencies) {
        this.reverse.get(dep)?.push(unit.id);
      }
    }
  }

  /**
   * Validate the facts, collapse cycles and compute the processing order.
   */
  static build(facts: readonly ParsedFact[], options: GraphOptions = {}): Result<SymbolGraph, MalformedGraphError> {
    const externals = new Set(options.externals ?? []);
    const problems: string[] = [];
    const byName = new Map<string, { fact: ParsedFact; order: number }>();

    facts.forEach((fact, order) => {
      if (fact.name.trim() === "") {
        problems.push(`fact #${order} has an empty name`);
        return;
      }
      const existing = byName.get(fact.name);
      if (existing) {
        problems.push(`duplicate symbol "${fact.name}" (facts #${existing.order} and #${order})`);
        return;
      }
      byName.set(fact.name, { fact, order });
    });

    // Resolved edges; externals and self edges are not part of the graph
    const edges = new Map<string, string[]>();
    const externalRefs = new Map<string, string[]>();
    for (const [name, { fact }] of byName) {
      const resolved: string[] = [];
      const external: string[] = [];
      for (const dep of fact.dependencies) {
        if (dep === name) continue;
        if (byName.has(dep)) {
          if (!resolved.includes(dep)) resolved.push(dep);
        } else if (externals.has(dep)) {
          if (!external.includes(dep)) external.push(dep);
        } else {
          problems.push(`"${name}" depends on unknown symbol "${dep}"`);
        }
      }
      edges.set(name, resolved);
      externalRefs.set(name, external);
    }

    if (problems.length > 0) {
      return Err(new MalformedGraphError(problems));
    }

    const names = [...byName.keys()];
    const components = stronglyConnectedComponents(names, edges);

    const cycleOf = new Map<string, string>();
    for (const component of components) {
      if (component.length < 2) continue;
      const cycleId = cycleIdFor(component);
      for (const name of component) cycleOf.set(name, cycleId);
    }

    const symbols = new Map<string, PortSymbol>();
    for (const [name, { fact, order }] of byName) {
      symbols.set(
        name,
        Object.freeze({
          name,
          kind: fact.kind,
          location: { ...fact.location },
          dependencies: Object.freeze([...(edges.get(name) ?? [])]),
          isStatic: fact.isStatic,
          cycleId: cycleOf.get(name) ?? null,
          sourceOrder: order,
          selfReferential: fact.dependencies.includes(name),
        })
      );
    }

    const unitBySymbol = new Map<string, string>();
    for (const component of components) {
      const id = component.length > 1 ? cycleIdFor(component) : component[0];
      for (const name of component) unitBySymbol.set(name, id);
    }

    const units = new Map<string, ProcessingUnit>();
    for (const component of components) {
      const members = component
        .map((name) => symbols.get(name))
        .filter((s): s is PortSymbol => s !== undefined)
        .sort((a, b) => a.sourceOrder - b.sourceOrder);
      const id = unitBySymbol.get(members[0].name) ?? members[0].name;

      const dependencies: string[] = [];
      const externalDependencies: string[] = [];
      for (const member of members) {
        for (const dep of member.dependencies) {
          const depUnit = unitBySymbol.get(dep);
          if (depUnit !== undefined && depUnit !== id && !dependencies.includes(depUnit)) {
            dependencies.push(depUnit);
          }
        }
        for (const ext of externalRefs.get(member.name) ?? []) {
          if (!externalDependencies.includes(ext)) externalDependencies.push(ext);
        }
      }

      units.set(
        id,
        Object.freeze({
          id,
          symbols: Object.freeze(members),
          dependencies: Object.freeze(dependencies),
          externalDependencies: Object.freeze(externalDependencies),
          sourceOrder: members[0].sourceOrder,
          isCycle: members.length > 1,
          requiresDifferentialTest: members.some((m) => m.kind === "function"),
        })
      );
    }

    const ordered = topologicalOrder(units);
    if (ordered.length !== units.size) {
      // Unreachable once cycles are collapsed; kept as an integrity check
      return Err(new MalformedGraphError(["dependency cycle survived condensation"]));
    }

    return Ok(new SymbolGraph(symbols, units, unitBySymbol, Object.freeze(ordered)));
  }

  /**
   * Processing units in dependency order, ties broken by source order.
   * The same array is returned on every call.
   */
  order(): readonly ProcessingUnit[] {
    return this.ordered;
  }

  get unitCount(): number {
    return this.ordered.length;
  }

  get symbolCount(): number {
    return this.symbols.size;
  }

  unit(id: string): ProcessingUnit | undefined {
    return this.units.get(id);
  }

  unitOf(symbolName: string): ProcessingUnit | undefined {
    const id = this.unitBySymbol.get(symbolName);
    return id === undefined ? undefined : this.units.get(id);
  }

  symbol(name: string): PortSymbol | undefined {
    return this.symbols.get(name);
  }

  /** Index of the unit in `order()`, or -1. */
  positionOf(unitId: string): number {
    return this.position.get(unitId) ?? -1;
  }

  /**
   * Units that depend directly on `unitId`, in processing order.
   */
  dependents(unitId: string): readonly string[] {
    return this.reverse.get(unitId) ?? [];
  }

  hasDependents(unitId: string): boolean {
    return this.dependents(unitId).length > 0;
  }

  /**
   * Every unit that depends on `unitId` directly or indirectly, in processing order.
   */
  transitiveDependents(unitId: string): string[] {
    const seen = new Set<string>();
    const queue = [...this.dependents(unitId)];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.dependents(next));
    }
    return [...seen].sort((a, b) => this.positionOf(a) - this.positionOf(b));
  }
}

/**
 * Kahn's algorithm over the condensation; the ready unit with the lowest
 * source order always goes next.
 */
function topologicalOrder(units: ReadonlyMap<string, ProcessingUnit>): ProcessingUnit[] {
  const remaining = new Map<string, number>();
  const dependents = new Map<string, ProcessingUnit[]>();
  for (const unit of units.values()) {
    remaining.set(unit.id, unit.dependencies.length);
    for (const dep of unit.dependencies) {
      const list = dependents.get(dep) ?? [];
      list.push(unit);
      dependents.set(dep, list);
    }
  }

  const ready: ProcessingUnit[] = [...units.values()].filter((u) => u.dependencies.length === 0);
  const ordered: ProcessingUnit[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => a.sourceOrder - b.sourceOrder);
    const next = ready.shift();
    if (!next) break;
    ordered.push(next);
    for (const dependent of dependents.get(next.id) ?? []) {
      const left = (remaining.get(dependent.id) ?? 0) - 1;
      remaining.set(dependent.id, left);
      if (left === 0) ready.push(dependent);
    }
  }

  return ordered;
}
