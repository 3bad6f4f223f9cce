import type { ProcessingUnit, RunSummary } from "../core/model.js";

/** Units listed in a plan before the rest are counted */
export const DEFAULT_PLAN_LIMIT = 50;

export function describeUnit(unit: ProcessingUnit): string {
  if (!unit.isCycle) return `${unit.id} (${unit.symbols[0]?.kind ?? "symbol"})`;
  return `${unit.id} [cycle of ${unit.symbols.length}: ${unit.symbols.map((s) => s.name).join(", ")}]`;
}

export function formatSummary(summary: RunSummary): string {
  const { counts } = summary;
  const lines = [
    `Run ${summary.runId} ${summary.interrupted ? "interrupted" : "finished"}`,
    `verified ${counts.verified}, failed ${counts.failed}, blocked ${counts.blocked}, pending ${counts.pending}`,
  ];
  if (summary.failures.length > 0) {
    lines.push("", "Failures:");
    for (const failure of summary.failures) {
      const firstLine = failure.diagnostic.split("\n")[0];
      lines.push(`- ${failure.unitId} [${failure.status}] ${firstLine}`);
    }
  }
  return lines.join("\n");
}
