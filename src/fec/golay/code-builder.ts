import { BitMatrix, hstack, identity } from './bit-matrix';
import { GOLAY_DATA_BITS } from './constants';
import { InvalidDimensionError, ShapeError } from './errors';

/**
 * Load a packed parity literal as a 12×width BitMatrix.
 * Rejects anything other than 12 rows of 11 or 12 binary columns.
 */
export function loadParity(rows: readonly number[], width: number): BitMatrix {
  if (rows.length !== GOLAY_DATA_BITS) {
    throw new InvalidDimensionError(`Parity literal must have ${GOLAY_DATA_BITS} rows, got ${rows.length}`);
  }
  if (width !== GOLAY_DATA_BITS - 1 && width !== GOLAY_DATA_BITS) {
    throw new ShapeError(`Parity literal width must be ${GOLAY_DATA_BITS - 1} or ${GOLAY_DATA_BITS}, got ${width}`);
  }
  return BitMatrix.fromPackedRows(rows, width);
}

/**
 * Systematic generator matrix G = [ I₁₂ | parity ]
 */
export function buildGenerator(parity: BitMatrix): BitMatrix {
  return hstack(identity(parity.rows), parity);
}

/**
 * Append an overall parity column so that every row of [ I | parity | p ] has even weight.
 *
 * The identity block contributes one 1 per row, hence the extra bit is
 * (1 + weight(parity row)) mod 2.
 */
export function extendParity(parity: BitMatrix): BitMatrix {
  const data: Uint8Array[] = [];
  for (let r = 0; r < parity.rows; r++) {
    const source = parity.row(r);
    // 元のパリティ部をそのまま先頭にコピー
    const row = new Uint8Array(parity.columns + 1);
    row.set(source, 0);
    // 単位行列部の1ビット分から始めてパリティ部の重みを加算
    let bit = 1;
    for (const b of source) bit ^= b;
    // 全体パリティビットを付加 (行の重みを偶数にする)
    row[parity.columns] = bit;
    data.push(row);
  }
  return BitMatrix.fromRows(data);
}
