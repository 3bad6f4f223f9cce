/**
 * Extracts structured diagnostics from compiler output.
 *
 * Understands the rustc layout (message line followed by a `-->` location)
 * and the gcc/clang layout (`file:line:col: severity: message`). Lines in
 * neither format are ignored; the raw output travels with the verdict.
 */

import type { Diagnostic, DiagnosticSeverity } from "../../core/model.js";

// src/lib.rs style header: error[E0308]: mismatched types
const RUSTC_HEADER = /^(error|warning|note|help)(?:\[([A-Za-z]+\d+)\])?:\s*(.+)$/;
// Location line under a rustc header:   --> src/lib.rs:12:5
const RUSTC_LOCATION = /^\s*-->\s*(.+?):(\d+):(\d+)\s*$/;
// gcc/clang: foo.c:10:5: error: 'x' undeclared
const GCC_LINE = /^(.+?):(\d+):(?:(\d+):)?\s*(fatal error|error|warning|note):\s*(.+)$/;
const GCC_FLAG = /\s*\[(-W[\w=-]+)\]$/;
const LINKER_ERROR = /undefined reference to|undefined symbol|ld returned \d+ exit status/;

/** rustc and cargo summaries that repeat what the diagnostics already say */
const SUMMARY_LINES = [
  /^aborting due to/,
  /^could not compile/,
  /^\d+ warnings? emitted/,
  /generated \d+ warnings?$/,
  /^For more information about (this|an) error/,
  /^Some errors have detailed explanations/,
];

function severityOf(word: string): DiagnosticSeverity {
  if (word === "error" || word === "fatal error") return "error";
  if (word === "warning") return "warning";
  return "note";
}

export function parseDiagnostics(output: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();
  let awaitingLocation: Diagnostic | null = null;

  const push = (d: Diagnostic): void => {
    const key = `${d.severity}|${d.code ?? ""}|${d.file ?? ""}|${d.line ?? ""}|${d.column ?? ""}|${d.message}`;
    if (seen.has(key)) return;
    seen.add(key);
    diagnostics.push(d);
  };

  for (const line of output.split(/\r?\n/)) {
    const location = RUSTC_LOCATION.exec(line);
    if (location && awaitingLocation) {
      awaitingLocation.file = location[1];
      awaitingLocation.line = Number(location[2]);
      awaitingLocation.column = Number(location[3]);
      push(awaitingLocation);
      awaitingLocation = null;
      continue;
    }

    const gcc = GCC_LINE.exec(line);
    if (gcc) {
      flush();
      let message = gcc[5].trim();
      let code: string | undefined;
      const flag = GCC_FLAG.exec(message);
      if (flag) {
        code = flag[1];
        message = message.slice(0, flag.index);
      }
      push({
        severity: severityOf(gcc[4]),
        message,
        ...(code ? { code } : {}),
        file: gcc[1],
        line: Number(gcc[2]),
        ...(gcc[3] ? { column: Number(gcc[3]) } : {}),
      });
      continue;
    }

    const header = RUSTC_HEADER.exec(line);
    if (header) {
      flush();
      const message = header[3].trim();
      if (SUMMARY_LINES.some((pattern) => pattern.test(message))) continue;
      awaitingLocation = {
        severity: severityOf(header[1]),
        message,
        ...(header[2] ? { code: header[2] } : {}),
      };
      continue;
    }

    if (LINKER_ERROR.test(line)) {
      flush();
      push({ severity: "error", message: line.trim() });
    }
  }
  flush();

  return diagnostics;

  // A rustc message without a location line still counts
  function flush(): void {
    if (awaitingLocation) {
      push(awaitingLocation);
      awaitingLocation = null;
    }
  }
}
