import type { Diagnostic, Feedback } from "./model.js";

const FEEDBACK_HEADER = "Progress: Task is not yet complete. The following issues were encountered:";

/** Diagnostics listed in the feedback text; the rest are counted. */
const MAX_LISTED_DIAGNOSTICS = 20;

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.file ? `${d.file}${d.line !== undefined ? `:${d.line}` : ""}${d.column !== undefined ? `:${d.column}` : ""}: ` : "";
  const code = d.code ? `[${d.code}]` : "";
  return `${where}${d.severity}${code}: ${d.message}`;
}

/**
 * Render feedback as the text handed to the generation backend.
 */
export function formatFeedback(feedback: Feedback): string {
  const lines = [FEEDBACK_HEADER, `- ${feedback.summary}`];
  const errors = feedback.diagnostics.filter((d) => d.severity === "error");
  const listed = (errors.length > 0 ? errors : feedback.diagnostics).slice(0, MAX_LISTED_DIAGNOSTICS);
  for (const d of listed) {
    lines.push(`- ${formatDiagnostic(d)}`);
  }
  const hidden = feedback.diagnostics.length - listed.length;
  if (hidden > 0) {
    lines.push(`- ... and ${hidden} more diagnostic(s)`);
  }
  return lines.join("\n");
}

/**
 * Summary plus diagnostic lines, without the header. This is what a
 * checkpoint record keeps as its last error.
 */
export function summarizeFeedback(feedback: Feedback): string {
  return [feedback.summary, ...feedback.diagnostics.slice(0, MAX_LISTED_DIAGNOSTICS).map(formatDiagnostic)].join("\n");
}
