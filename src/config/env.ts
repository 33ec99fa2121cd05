/**
 * Environment access helpers.
 * The loader never touches `process.env` directly: callers hand it an
 * `EnvSource`, which keeps loading deterministic under test.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

const INT32_MAX = 2_147_483_647;
const INT32_MIN = -2_147_483_648;

// C isspace(): space, \t, \n, \v, \f, \r
const LEADING_INTEGER = /^[ \t\n\v\f\r]*([+-]?)(\d*)/;
const STRICT_INTEGER = /^[+-]?\d+$/;

// ── Lenient conversion ───────────────────────────────────────

/**
 * Historical numeric-string conversion: parse an optionally signed run of
 * leading digits and ignore the rest. Text without leading digits yields 0,
 * so `"12x"` is 12 and `"abc"` is 0. Saturates to the signed 32-bit range.
 */
export function parseIntLenient(text: string): number {
  const match = LEADING_INTEGER.exec(text);
  const digits = match?.[2] ?? '';
  if (digits.length === 0) return 0;

  const magnitude = Number(digits);
  if (magnitude === 0) return 0;

  const value = match?.[1] === '-' ? -magnitude : magnitude;
  return Math.min(INT32_MAX, Math.max(INT32_MIN, value));
}

// ── Variable lookup ──────────────────────────────────────────

export interface IntReading {
  value: number;
  /** Set when the text was present but not a plain integer, or was clamped. */
  warning?: string;
}

export function readIntVar(
  env: EnvSource,
  name: string,
  defaultValue: number,
): IntReading {
  const raw = env[name];
  if (raw === undefined) return { value: defaultValue };

  const value = parseIntLenient(raw);
  const text = raw.trim();
  if (!STRICT_INTEGER.test(text)) {
    return {
      value,
      warning: `${name}="${raw}" is not an integer; using ${String(value)}`,
    };
  }
  if (Number(text) !== value) {
    return {
      value,
      warning: `${name}="${raw}" is out of range; using ${String(value)}`,
    };
  }
  return { value };
}

/** Layer sources left to right; later defined values win. */
export function mergeEnv(...sources: EnvSource[]): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    for (const [name, value] of Object.entries(source)) {
      if (value !== undefined) merged[name] = value;
    }
  }
  return merged;
}
