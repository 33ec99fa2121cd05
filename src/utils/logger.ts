/**
 * Diagnostic logger for xferbench-config.
 *
 * All output goes to stderr so stdout stays clean for the run summary and
 * JSON output. Bracketed tags keep lines greppable in benchmark logs.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function warn(message: string): void {
  write(`[WARN] ${message}`);
}

export function error(message: string): void {
  write(`[ERROR] ${message}`);
}
