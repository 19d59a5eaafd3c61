/**
 * Fixed-size matrix over GF(2)
 *
 * Entries are stored as Uint8Array rows holding 0 or 1. Sums are reduced with XOR and
 * products with AND, so every intermediate value stays exactly 0 or 1.
 * A BitMatrix never changes after construction: accessors return copies and every
 * operation allocates a new matrix.
 */

import { DimensionMismatchError, InvalidBitError, InvalidDimensionError } from './errors';

/** Bit vector view accepted by dot(): a matrix row, a column, or a plain array */
export type BitVector = ArrayLike<number>;

/** Widest row that packs exactly into a number (Number.MAX_SAFE_INTEGER is 2^53 - 1) */
export const MAX_PACKED_WIDTH = 53;

function assertPackedWidth(width: number): void {
  if (width > MAX_PACKED_WIDTH) {
    throw new InvalidDimensionError(`Cannot pack ${width} bits into a number (max ${MAX_PACKED_WIDTH})`);
  }
}

function assertBit(value: number, label: string): void {
  if (value !== 0 && value !== 1) {
    throw new InvalidBitError(`${label} is ${value}, expected 0 or 1`);
  }
}

function assertDimension(size: number, label: string): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidDimensionError(`${label} must be a positive integer, got ${size}`);
  }
}

export class BitMatrix {
  readonly rows: number;
  readonly columns: number;
  private readonly data: Uint8Array[];

  // 呼び出し元は検証済みの新しい配列だけを渡す (fromRows / fromPackedRows)
  private constructor(data: Uint8Array[], columns: number) {
    assertDimension(data.length, 'Row count');
    assertDimension(columns, 'Column count');
    this.rows = data.length;
    this.columns = columns;
    this.data = data;
  }

  /**
   * Build from nested arrays or typed rows; every row must have the same length and hold only 0/1.
   * The rows are copied, so later writes to the input do not reach the matrix.
   */
  static fromRows(rows: readonly BitVector[]): BitMatrix {
    if (rows.length === 0) {
      throw new InvalidDimensionError('Row count must be a positive integer, got 0');
    }
    const columns = rows[0].length;
    const data = rows.map((row, r) => {
      if (row.length !== columns) {
        throw new DimensionMismatchError(`Row ${r} has ${row.length} columns, expected ${columns}`);
      }
      const bits = new Uint8Array(columns);
      for (let c = 0; c < columns; c++) {
        const value = row[c];
        assertBit(value, `Entry (${r}, ${c})`);
        bits[c] = value;
      }
      return bits;
    });
    return new BitMatrix(data, columns);
  }

  /**
   * Build from rows packed MSB-first: bit (width - 1 - c) of rows[r] is entry (r, c).
   */
  static fromPackedRows(rows: readonly number[], width: number): BitMatrix {
    assertDimension(width, 'Width');
    assertPackedWidth(width);
    if (rows.length === 0) {
      throw new InvalidDimensionError('Row count must be a positive integer, got 0');
    }
    const limit = 2 ** width;
    const data = rows.map((value, r) => {
      if (!Number.isInteger(value) || value < 0 || value >= limit) {
        throw new InvalidBitError(`Row ${r} value ${value} does not fit in ${width} bits`);
      }
      const bits = new Uint8Array(width);
      for (let c = 0; c < width; c++) {
        bits[c] = Math.floor(value / 2 ** (width - 1 - c)) & 1;
      }
      return bits;
    });
    return new BitMatrix(data, width);
  }

  get(row: number, column: number): number {
    this.checkIndex(row, this.rows, 'Row');
    this.checkIndex(column, this.columns, 'Column');
    return this.data[row][column];
  }

  row(row: number): Uint8Array {
    this.checkIndex(row, this.rows, 'Row');
    return new Uint8Array(this.data[row]);
  }

  column(column: number): Uint8Array {
    this.checkIndex(column, this.columns, 'Column');
    const bits = new Uint8Array(this.rows);
    for (let r = 0; r < this.rows; r++) {
      bits[r] = this.data[r][column];
    }
    return bits;
  }

  toArray(): number[][] {
    return this.data.map(row => Array.from(row));
  }

  /** Rows as unsigned integers, column 0 in the most significant bit */
  toPackedRows(): number[] {
    assertPackedWidth(this.columns);
    return this.data.map(row => packBits(row));
  }

  equals(other: BitMatrix): boolean {
    if (this.rows !== other.rows || this.columns !== other.columns) return false;
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.columns; c++) {
        if (this.data[r][c] !== other.data[r][c]) return false;
      }
    }
    return true;
  }

  private checkIndex(index: number, size: number, label: string): void {
    if (!Number.isInteger(index) || index < 0 || index >= size) {
      throw new RangeError(`${label} index ${index} out of bounds (0..${size - 1})`);
    }
  }
}

/**
 * Pack a bit vector MSB-first into an unsigned integer
 */
export function packBits(bits: BitVector): number {
  assertPackedWidth(bits.length);
  let value = 0;
  for (let i = 0; i < bits.length; i++) {
    assertBit(bits[i], `Bit ${i}`);
    value = value * 2 + bits[i];
  }
  return value;
}

/**
 * n×n identity matrix
 */
export function identity(n: number): BitMatrix {
  assertDimension(n, 'Identity size');
  const data = Array.from({ length: n }, (_, i) => {
    const row = new Uint8Array(n);
    row[i] = 1;
    return row;
  });
  return BitMatrix.fromRows(data);
}

/**
 * Horizontal concatenation [a | b]
 */
export function hstack(a: BitMatrix, b: BitMatrix): BitMatrix {
  if (a.rows !== b.rows) {
    throw new DimensionMismatchError(`Cannot hstack ${a.rows}x${a.columns} with ${b.rows}x${b.columns}: row counts differ`);
  }
  const data: Uint8Array[] = [];
  for (let r = 0; r < a.rows; r++) {
    const row = new Uint8Array(a.columns + b.columns);
    row.set(a.row(r), 0);
    row.set(b.row(r), a.columns);
    data.push(row);
  }
  return BitMatrix.fromRows(data);
}

export function transpose(a: BitMatrix): BitMatrix {
  const data: Uint8Array[] = [];
  for (let c = 0; c < a.columns; c++) {
    data.push(a.column(c));
  }
  return BitMatrix.fromRows(data);
}

/**
 * Inner product over GF(2); entries other than 0/1 are rejected
 * @returns 0 or 1
 */
export function dot(u: BitVector, v: BitVector): number {
  if (u.length !== v.length) {
    throw new DimensionMismatchError(`Cannot dot vectors of length ${u.length} and ${v.length}`);
  }
  let sum = 0;
  for (let i = 0; i < u.length; i++) {
    assertBit(u[i], `Left entry ${i}`);
    assertBit(v[i], `Right entry ${i}`);
    // GF(2)では乗算がAND、加算がXOR
    sum ^= u[i] & v[i];
  }
  return sum;
}

/**
 * Matrix product over GF(2)
 */
export function matmul(a: BitMatrix, b: BitMatrix): BitMatrix {
  if (a.columns !== b.rows) {
    throw new DimensionMismatchError(`Cannot multiply ${a.rows}x${a.columns} by ${b.rows}x${b.columns}`);
  }
  const bColumns = Array.from({ length: b.columns }, (_, c) => b.column(c));
  const data: Uint8Array[] = [];
  for (let r = 0; r < a.rows; r++) {
    const aRow = a.row(r);
    const row = new Uint8Array(b.columns);
    for (let c = 0; c < b.columns; c++) {
      row[c] = dot(aRow, bColumns[c]);
    }
    data.push(row);
  }
  return BitMatrix.fromRows(data);
}

/**
 * Rank over GF(2) by Gauss-Jordan elimination on a working copy
 */
export function rank(a: BitMatrix): number {
  const work = Array.from({ length: a.rows }, (_, r) => a.row(r));
  let pivotRow = 0;

  // 左の列から順に掃き出し、見つかったピボットの数がランク
  for (let col = 0; col < a.columns && pivotRow < a.rows; col++) {
    // 現在の列でピボットを探す
    let found = -1;
    for (let row = pivotRow; row < a.rows; row++) {
      if (work[row][col] === 1) {
        found = row;
        break;
      }
    }
    if (found === -1) continue; // この列は従属

    // ピボット行を上に移動
    [work[pivotRow], work[found]] = [work[found], work[pivotRow]];

    // この列の他の行の1を消去
    for (let row = 0; row < a.rows; row++) {
      if (row !== pivotRow && work[row][col] === 1) {
        // col より左は既に0なので col から XOR すれば十分
        for (let c = col; c < a.columns; c++) {
          work[row][c] ^= work[pivotRow][c];
        }
      }
    }
    pivotRow++;
  }

  return pivotRow;
}
