import type { CheckpointRecord, UnitStatus } from "../model.js";
import type { SymbolGraph } from "../graph/SymbolGraph.js";

export interface DerivedStatus {
  status: UnitStatus;
  /** Failed unit that blocks this one */
  blockedBy?: string;
}

/**
 * Display status of every unit from stored records alone: the record's
 * status, or `blocked` when a transitive dependency has failed.
 */
export function deriveStatuses(
  graph: SymbolGraph,
  recordOf: (unitId: string) => CheckpointRecord | null
): Map<string, DerivedStatus> {
  const statuses = new Map<string, DerivedStatus>();
  for (const unit of graph.order()) {
    statuses.set(unit.id, { status: recordOf(unit.id)?.status ?? "unstarted" });
  }
  for (const unit of graph.order()) {
    if (statuses.get(unit.id)?.status !== "failed") continue;
    for (const dependent of graph.transitiveDependents(unit.id)) {
      const current = statuses.get(dependent);
      if (!current || current.status === "verified" || current.status === "failed" || current.status === "blocked") continue;
      statuses.set(dependent, { status: "blocked", blockedBy: unit.id });
    }
  }
  return statuses;
}
