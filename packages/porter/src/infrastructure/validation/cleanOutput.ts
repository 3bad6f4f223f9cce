/**
 * Cleaning of compiler and test output before it is stored or fed back.
 * Strips ANSI codes and drops build-tool progress noise; never drops a
 * line that looks like a diagnostic.
 */

import stripAnsi from "strip-ansi";

const NOISE_PATTERNS = [
  // cargo/ninja progress bars: "Building [=====>   ] 12/40: foo"
  /^\s*Building \[[\s=>-]*\]\s*\d+\/\d+/,

  // make/ninja step counters on their own: "[3/17]"
  /^\s*\[\d+\/\d+\]\s*$/,

  // Spinner frames
  /^[\s⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏|\\/-]+$/,

  // Lines rewritten in place with carriage returns
  /\r/,

  // Dots or dashes used as progress
  /^[\s.\-_]+$/,

  // Download/unpack progress with sizes or percentages
  /^\s*(Downloading|Downloaded|Unpacking|Fetching).*\d+(\.\d+)?\s*(B|KB|KiB|MB|MiB|%)\b.*$/i,
];

/**
 * Lines that carry a diagnostic and are kept whatever else they match.
 */
const DIAGNOSTIC_PATTERNS = [/\berror\b/i, /\bwarning\b/i, /\bpanicked\b/i, /\bFAILED\b/, /\bmismatch\b/i, /-->/];

function isDiagnostic(line: string): boolean {
  return DIAGNOSTIC_PATTERNS.some((pattern) => pattern.test(line));
}

function cleanLine(line: string): string | null {
  const cleaned = stripAnsi(line).replace(/\s+$/, "");
  if (cleaned.trim() === "") return "";
  if (isDiagnostic(cleaned)) return cleaned.replace(/\r/g, "");
  for (const pattern of NOISE_PATTERNS) {
    if (pattern.test(cleaned)) return null;
  }
  return cleaned;
}

/**
 * Strip ANSI codes and progress noise. Leading whitespace is kept because
 * compilers use it to align source excerpts under their messages.
 */
export function cleanOutput(output: string): string {
  const cleaned: string[] = [];
  let previousEmpty = false;

  for (const line of output.split(/\r?\n/)) {
    const result = cleanLine(line);
    if (result === null) continue;
    if (result === "") {
      if (!previousEmpty && cleaned.length > 0) cleaned.push("");
      previousEmpty = true;
      continue;
    }
    previousEmpty = false;
    cleaned.push(result);
  }

  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === "") {
    cleaned.pop();
  }
  return cleaned.join("\n");
}

/**
 * Keep at most `maxLines` lines: the head, where the first compiler errors
 * are, and the tail, where test runners print their verdict.
 */
export function compactOutput(output: string, maxLines = 200): string {
  const lines = output.split("\n");
  if (lines.length <= maxLines) return output;

  const headCount = Math.ceil(maxLines / 2);
  const tailCount = maxLines - headCount;
  const omitted = lines.length - headCount - tailCount;
  return [...lines.slice(0, headCount), `... (${omitted} lines omitted) ...`, ...lines.slice(-tailCount)].join("\n");
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

/**
 * Cut output to `maxBytes` of UTF-8, keeping its start or its end.
 */
export function truncateOutput(
  output: string,
  maxBytes: number,
  keep: "head" | "tail" = "head"
): { output: string; truncated: boolean } {
  if (Buffer.byteLength(output, "utf8") <= maxBytes) {
    return { output, truncated: false };
  }

  const marker = "... (output truncated) ...";
  const budget = Math.max(0, maxBytes - Buffer.byteLength(marker, "utf8") - 1);

  // Largest slice that fits, found by binary search over code units
  let low = 0;
  let high = output.length;
  while (low < high) {
    const mid = Math.floor((low + high + 1) / 2);
    const slice = keep === "head" ? output.slice(0, mid) : output.slice(output.length - mid);
    if (Buffer.byteLength(slice, "utf8") <= budget) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  // Never keep half of a surrogate pair
  if (low > 0) {
    const edge = keep === "head" ? output.charCodeAt(low - 1) : output.charCodeAt(output.length - low);
    if (keep === "head" ? isHighSurrogate(edge) : isLowSurrogate(edge)) low--;
  }

  const kept = keep === "head" ? output.slice(0, low) : output.slice(output.length - low);
  return {
    output: keep === "head" ? `${kept}\n${marker}` : `${marker}\n${kept}`,
    truncated: true,
  };
}

/** Default size of output surfaced in a verdict */
export const MAX_VERDICT_OUTPUT_BYTES = 64 * 1024;

/**
 * Clean, compact and truncate output for a verdict.
 */
export function processOutput(output: string, keep: "head" | "tail" = "head", maxBytes = MAX_VERDICT_OUTPUT_BYTES): string {
  return truncateOutput(compactOutput(cleanOutput(output)), maxBytes, keep).output;
}
