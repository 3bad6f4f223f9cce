import type { ArtifactSet, ProcessingUnit } from "../../core/model.js";

const SAFE_WORD = /^[\w@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (value !== "" && SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Fill a command template. Known placeholders: {unit}, {symbol}, {symbols},
 * {bindings}, {implementation}, {test}, {projectDir}. Unknown ones are left
 * as they are.
 */
export function expandCommand(
  template: string,
  unit: ProcessingUnit,
  projectDir: string,
  artifacts?: ArtifactSet
): string {
  const values: Record<string, string> = {
    unit: shellQuote(unit.id),
    symbol: shellQuote(unit.symbols[0]?.name ?? unit.id),
    symbols: unit.symbols.map((s) => shellQuote(s.name)).join(" "),
    projectDir: shellQuote(projectDir),
  };
  if (artifacts) {
    values.bindings = shellQuote(artifacts.bindings.path);
    values.implementation = shellQuote(artifacts.implementation.path);
    if (artifacts.differentialTest) values.test = shellQuote(artifacts.differentialTest.path);
  }
  return template.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match);
}
