import { ELEMENT_SIZE, PSEUDO_RANDOM_FILL } from './defaults.js';
import { FillPatternError } from './errors.js';

// ── Replication factor ───────────────────────────────────────

/**
 * Number of times a pattern of `hexLength` digits is repeated so the
 * decoded bytes tile whole 4-byte elements. For any even length,
 * `copies * hexLength` is a multiple of 8.
 */
export function patternCopies(hexLength: number): 1 | 2 | 4 {
  switch (hexLength % 8) {
    case 0:
      return 1;
    case 4:
      return 2;
    default:
      return 4;
  }
}

// ── Hex decoding ─────────────────────────────────────────────

const CODE_0 = 48;
const CODE_9 = 57;
const CODE_UPPER_A = 65;
const CODE_UPPER_F = 70;
const CODE_LOWER_A = 97;
const CODE_LOWER_F = 102;

function hexNibble(pattern: string, index: number): number {
  const code = pattern.charCodeAt(index);
  if (code >= CODE_0 && code <= CODE_9) return code - CODE_0;
  if (code >= CODE_UPPER_A && code <= CODE_UPPER_F) return code - CODE_UPPER_A + 10;
  if (code >= CODE_LOWER_A && code <= CODE_LOWER_F) return code - CODE_LOWER_A + 10;

  throw new FillPatternError(
    'INVALID_HEX_DIGIT',
    `FILL_PATTERN must contain only hex digits (0-9/a-f/A-F), not '${pattern.charAt(index)}'`,
  );
}

/**
 * Decode a `FILL_PATTERN` hex string into the bytes used to fill source
 * buffers. The decoded pattern is repeated 1, 2 or 4 times so the result
 * is always a whole number of elements.
 *
 * An absent pattern decodes to an empty buffer, which tells the consumer to
 * use the pseudo-random fill from {@link defaultFillValue}.
 *
 * @throws FillPatternError on an odd number of digits or a non-hex digit.
 */
export function decodeFillPattern(pattern?: string): Uint8Array {
  if (pattern === undefined) return new Uint8Array(0);

  const hexLength = pattern.length;
  if (hexLength % 2 !== 0) {
    throw new FillPatternError(
      'ODD_LENGTH_PATTERN',
      'FILL_PATTERN must contain an even-number of hex digits',
    );
  }

  const unit = new Uint8Array(hexLength / 2);
  for (let k = 0; k < unit.length; k++) {
    const high = hexNibble(pattern, 2 * k);
    const low = hexNibble(pattern, 2 * k + 1);
    unit[k] = (high << 4) | low;
  }

  const copies = patternCopies(hexLength);
  const bytes = new Uint8Array(copies * unit.length);
  for (let c = 0; c < copies; c++) {
    bytes.set(unit, c * unit.length);
  }
  return bytes;
}

// ── Source fill ──────────────────────────────────────────────

/** Pseudo-random default for element `index` when no pattern is set. */
export function defaultFillValue(index: number): number {
  return (index % PSEUDO_RANDOM_FILL.MODULUS) + PSEUDO_RANDOM_FILL.OFFSET;
}

/**
 * Materialize `count` source elements. An empty pattern gives the
 * pseudo-random sequence; otherwise the pattern bytes are read as
 * little-endian floats and tiled across the output.
 */
export function fillSourceElements(pattern: Uint8Array, count: number): Float32Array {
  const elements = new Float32Array(count);

  if (pattern.length === 0) {
    for (let i = 0; i < count; i++) {
      elements[i] = defaultFillValue(i);
    }
    return elements;
  }

  if (pattern.length % ELEMENT_SIZE !== 0) {
    throw new RangeError(
      `Fill pattern length ${String(pattern.length)} is not a multiple of ${String(ELEMENT_SIZE)}`,
    );
  }

  const view = new DataView(pattern.buffer, pattern.byteOffset, pattern.byteLength);
  const unitCount = pattern.length / ELEMENT_SIZE;
  for (let i = 0; i < count; i++) {
    elements[i] = view.getFloat32((i % unitCount) * ELEMENT_SIZE, true);
  }
  return elements;
}
