/**
 * Telemetry and observability helpers
 */

import type { CliIO } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line: `metric <key> k=v ...`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ") + "\n";
}

/**
 * Run a command body, emitting a timing metric to stderr when verbose
 */
export function withTiming<T>(io: CliIO, verbose: boolean, label: string, fn: () => T): T {
  const start = Date.now();
  let success = false;

  try {
    const result = fn();
    success = true;
    return result;
  } finally {
    if (verbose) {
      io.stderr(formatMetric(label, { duration_ms: Date.now() - start, success }));
    }
  }
}
