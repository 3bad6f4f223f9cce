import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import type { Result } from "@portwright/core";
import { Ok, Err, tryCatch } from "@portwright/core";

import type { PortSymbol } from "../../core/model.js";
import type { SourceProvider } from "../../core/ports/SourceProvider.js";

/**
 * Reads symbol definitions from the source tree by location.
 *
 * When the analyzer gives no end line the definition runs until braces
 * balance and a line ends in `}` or `;`, or until a macro line stops
 * continuing.
 */
export class FileSourceProvider implements SourceProvider {
  private readonly files = new Map<string, string[]>();

  constructor(private readonly sourceDir: string) {}

  read(symbol: PortSymbol): Result<string, Error> {
    const lines = this.linesOf(symbol.location.file);
    if (!lines.ok) return lines;

    const start = symbol.location.line - 1;
    if (start >= lines.value.length) {
      return Err(new Error(`${symbol.location.file} has no line ${symbol.location.line}`));
    }
    const end = symbol.location.endLine !== undefined
      ? Math.min(symbol.location.endLine, lines.value.length)
      : findDefinitionEnd(lines.value, start, symbol.kind === "macro-constant");
    return Ok(lines.value.slice(start, end).join("\n"));
  }

  private linesOf(file: string): Result<string[], Error> {
    const cached = this.files.get(file);
    if (cached) return Ok(cached);
    const read = tryCatch(() => readFileSync(resolve(this.sourceDir, file), "utf-8").split(/\r?\n/));
    if (read.ok) this.files.set(file, read.value);
    return read;
  }
}

/**
 * Exclusive end index of the definition starting at `start`.
 */
export function findDefinitionEnd(lines: readonly string[], start: number, isMacro: boolean): number {
  if (isMacro) {
    let i = start;
    while (i < lines.length - 1 && lines[i].trimEnd().endsWith("\\")) i++;
    return i + 1;
  }

  let depth = 0;
  let opened = false;
  for (let i = start; i < lines.length; i++) {
    for (const ch of lines[i]) {
      if (ch === "{") {
        depth++;
        opened = true;
      } else if (ch === "}") {
        depth--;
      }
    }
    const trimmed = lines[i].trimEnd();
    if (depth <= 0 && (trimmed.endsWith(";") || (opened && trimmed.endsWith("}")))) {
      return i + 1;
    }
  }
  return lines.length;
}
