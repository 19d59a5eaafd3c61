/**
 * Single-error syndrome table for the (23, 12, 7) standard code
 *
 * The canonical error pattern has its 1 at position 11, the least significant data
 * bit of a 23-bit codeword. Rotating it left by i moves the error to position 11 - i,
 * which is data bit i (weight 2^i) of the 12-bit data word. A decoder flips data bit
 * i when the observed syndrome matches entry i.
 */

import { BitMatrix, matmul, transpose, type BitVector } from './bit-matrix';
import { GOLAY_DATA_BITS } from './constants';
import { DimensionMismatchError, InvalidDimensionError, SyndromeCollisionError } from './errors';

export const STANDARD_CODE_LENGTH = 23;
export const CANONICAL_ERROR_POSITION = 11;

export function canonicalErrorPattern(
  length: number = STANDARD_CODE_LENGTH,
  position: number = CANONICAL_ERROR_POSITION
): Uint8Array {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidDimensionError(`Error pattern length must be a positive integer, got ${length}`);
  }
  if (!Number.isInteger(position) || position < 0 || position >= length) {
    throw new RangeError(`Error position ${position} out of bounds (0..${length - 1})`);
  }
  const pattern = new Uint8Array(length);
  pattern[position] = 1;
  return pattern;
}

/**
 * Cyclic rotation towards lower indices: out[j] = vec[(j + shift) mod length].
 * A negative shift rotates the other way.
 */
export function rotateLeft(vec: BitVector, shift: number): Uint8Array {
  if (!Number.isInteger(shift)) {
    throw new RangeError(`Rotation shift must be an integer, got ${shift}`);
  }
  const n = vec.length;
  const out = new Uint8Array(n);
  if (n === 0) return out;
  const offset = ((shift % n) + n) % n;
  for (let j = 0; j < n; j++) {
    out[j] = vec[(j + offset) % n];
  }
  return out;
}

/**
 * Syndrome of a received word: (word · Hᵀ) mod 2
 */
export function syndromeOf(word: BitVector, parityCheck: BitMatrix): Uint8Array {
  const rowVector = BitMatrix.fromRows([Array.from(word)]);
  return matmul(rowVector, transpose(parityCheck)).row(0);
}

/**
 * Build the 12-entry single-error syndrome table from an 11×23 parity check.
 * Entries are not deduplicated; see assertDistinctSyndromes().
 */
export function buildSyndromeTable(parityCheck: BitMatrix): BitMatrix {
  if (parityCheck.columns !== STANDARD_CODE_LENGTH) {
    throw new DimensionMismatchError(`Syndrome table needs a ${STANDARD_CODE_LENGTH}-column parity check, got ${parityCheck.columns}`);
  }
  const base = canonicalErrorPattern();
  const data: Uint8Array[] = [];
  for (let i = 0; i < GOLAY_DATA_BITS; i++) {
    data.push(syndromeOf(rotateLeft(base, i), parityCheck));
  }
  return BitMatrix.fromRows(data);
}

/**
 * Single-error correction needs every syndrome to be nonzero and unique.
 */
export function assertDistinctSyndromes(table: BitMatrix): void {
  const seen = new Map<number, number>();
  const packed = table.toPackedRows();
  for (let i = 0; i < packed.length; i++) {
    const value = packed[i];
    if (value === 0) {
      throw new SyndromeCollisionError(i, null);
    }
    const previous = seen.get(value);
    if (previous !== undefined) {
      throw new SyndromeCollisionError(i, previous);
    }
    seen.set(value, i);
  }
}

