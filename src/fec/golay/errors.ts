/**
 * Golay table generation errors
 *
 * All of these are integrity failures over fixed constants, so nothing catches them
 * inside the library: they abort table generation for the affected code.
 */

export class GolayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Operand shapes are incompatible (hstack, dot, matmul, ragged rows). */
export class DimensionMismatchError extends GolayError {}

/** Identity-form parity check on a non-square block, or a parity literal of the wrong width. */
export class ShapeError extends GolayError {}

/** Non-positive or non-integer matrix size. */
export class InvalidDimensionError extends GolayError {}

/** Entry outside {0, 1}, or a packed row value that does not fit its width. */
export class InvalidBitError extends GolayError {}

export class SelfDualityViolationError extends GolayError {
  readonly row: number;
  readonly other: number;

  constructor(row: number, other: number) {
    super(`Generator rows ${row} and ${other} are not orthogonal`);
    this.row = row;
    this.other = other;
  }
}

export class ParityCheckViolationError extends GolayError {
  readonly row: number;
  readonly check: number;

  constructor(row: number, check: number) {
    super(`Generator row ${row} fails parity check ${check}`);
    this.row = row;
    this.check = check;
  }
}

export class RankDeficiencyError extends GolayError {
  readonly rank: number;
  readonly expected: number;

  constructor(rank: number, expected: number) {
    super(`Matrix is not full rank (rank=${rank}, expected=${expected})`);
    this.rank = rank;
    this.expected = expected;
  }
}

/**
 * A syndrome table cannot locate single errors.
 * `other` is null when entry `index` is the zero syndrome.
 */
export class SyndromeCollisionError extends GolayError {
  readonly index: number;
  readonly other: number | null;

  constructor(index: number, other: number | null) {
    super(other === null
      ? `Syndrome ${index} is zero`
      : `Syndromes ${other} and ${index} coincide`);
    this.index = index;
    this.other = other;
  }
}
