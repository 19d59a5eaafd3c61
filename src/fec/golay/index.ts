/**
 * Golay code table generation
 *
 * Runs the whole pipeline for one code type and publishes the result as packed
 * integer tables for an encoder/decoder elsewhere:
 *
 *   parity literal → G = [ I | A ] → H → G·Hᵀ = 0
 *     ├─ extended (24, 12, 8): self-duality check, identity-form H
 *     └─ standard (23, 12, 7): single-error syndrome table
 *
 * Any failed check throws before anything is cached or returned.
 */

import { transpose, type BitMatrix } from './bit-matrix';
import { buildGenerator, loadParity } from './code-builder';
import {
  EXTENDED_PARITY_ROWS,
  EXTENDED_PARITY_WIDTH,
  GOLAY_DATA_BITS,
  STANDARD_PARITY_ROWS,
  STANDARD_PARITY_WIDTH,
} from './constants';
import { DimensionMismatchError } from './errors';
import { parityCheckIdentityForm, parityCheckTransposed, verifyParityCheck } from './parity-check';
import { verifySelfDual } from './self-duality';
import { assertDistinctSyndromes, buildSyndromeTable } from './syndrome-table';

// Golay符号タイプ定義
export type GolayCodeType = 'GOLAY_23_12_7' | 'GOLAY_24_12_8';

/** Rows packed MSB-first, each `width` bits wide */
export interface PackedTable {
  readonly rows: readonly number[];
  readonly width: number;
}

export interface GolayTables {
  readonly type: GolayCodeType;
  readonly n: number;
  readonly k: number;
  readonly minDistance: number;
  readonly parity: PackedTable;           // A
  readonly parityTranspose: PackedTable;  // Aᵀ
  readonly generator: PackedTable;        // G = [ I | A ]
  readonly parityCheck: PackedTable;      // H = [ Aᵀ | I ]
  readonly altParityCheck?: PackedTable;  // H = [ I | A ] (extended only)
  readonly parityCheckTranspose?: PackedTable; // Hᵀ (standard only)
  readonly syndromes?: PackedTable;       // single-error syndromes (standard only)
}

export const GOLAY_CONFIGS = {
  'GOLAY_23_12_7': {
    n: 23,
    k: 12,
    minDistance: 7,
    parityRows: STANDARD_PARITY_ROWS,
    parityWidth: STANDARD_PARITY_WIDTH,
    selfDual: false
  },
  'GOLAY_24_12_8': {
    n: 24,
    k: 12,
    minDistance: 8,
    parityRows: EXTENDED_PARITY_ROWS,
    parityWidth: EXTENDED_PARITY_WIDTH,
    selfDual: true
  }
} as const;

const golayTablesCache = new Map<GolayCodeType, GolayTables>();

function pack(matrix: BitMatrix): PackedTable {
  return Object.freeze({
    rows: Object.freeze(matrix.toPackedRows()),
    width: matrix.columns
  });
}

function buildGolayTables(type: GolayCodeType): GolayTables {
  const config = GOLAY_CONFIGS[type];
  // パリティ部をロードして生成行列 G = [I | A] を構築
  const parity = loadParity(config.parityRows, config.parityWidth);
  const generator = buildGenerator(parity);
  const parityCheck = parityCheckTransposed(parity);

  // 形状とパリティ検査行列の検証 (G・Hᵀ = 0, フルランク)

  if (generator.columns !== config.n || generator.rows !== GOLAY_DATA_BITS) {
    throw new DimensionMismatchError(`${type}: generator is ${generator.rows}x${generator.columns}, expected ${GOLAY_DATA_BITS}x${config.n}`);
  }
  verifyParityCheck(generator, parityCheck);

  const base = {
    type,
    n: config.n,
    k: config.k,
    minDistance: config.minDistance,
    parity: pack(parity),
    parityTranspose: pack(transpose(parity)),
    generator: pack(generator),
    parityCheck: pack(parityCheck)
  };

  if (config.selfDual) {
    // 拡張符号: 自己双対性の確認と単位行列形式のH
    verifySelfDual(generator);
    const altParityCheck = parityCheckIdentityForm(parity);
    verifyParityCheck(generator, altParityCheck);
    return Object.freeze({ ...base, altParityCheck: pack(altParityCheck) });
  }

  // 標準符号: 単一誤りのシンドロームテーブル構築
  const syndromes = buildSyndromeTable(parityCheck);
  assertDistinctSyndromes(syndromes);
  return Object.freeze({
    ...base,
    parityCheckTranspose: pack(transpose(parityCheck)),
    syndromes: pack(syndromes)
  });
}

/**
 * Generate (or fetch the cached) verified tables for a Golay code
 */
export function generateGolayTables(type: GolayCodeType): GolayTables {
  const cached = golayTablesCache.get(type);
  if (cached) {
    return cached;
  }
  const tables = buildGolayTables(type);
  golayTablesCache.set(type, tables);
  return tables;
}

export function clearGolayTableCache(): void {
  golayTablesCache.clear();
}

export function getGolayParams(type: GolayCodeType): {
  n: number;
  k: number;
  minDistance: number;
  parityBits: number;
} {
  const config = GOLAY_CONFIGS[type];
  return {
    n: config.n,
    k: config.k,
    minDistance: config.minDistance,
    parityBits: config.n - config.k
  };
}

export { BitMatrix, MAX_PACKED_WIDTH, dot, hstack, identity, matmul, packBits, rank, transpose } from './bit-matrix';
export type { BitVector } from './bit-matrix';
export { buildGenerator, extendParity, loadParity } from './code-builder';
export * from './constants';
export * from './errors';
export { deriveParityCheck, parityCheckIdentityForm, parityCheckTransposed, verifyParityCheck } from './parity-check';
export type { ParityCheckForm } from './parity-check';
export { verifySelfDual } from './self-duality';
export {
  assertDistinctSyndromes,
  buildSyndromeTable,
  CANONICAL_ERROR_POSITION,
  canonicalErrorPattern,
  rotateLeft,
  STANDARD_CODE_LENGTH,
  syndromeOf
} from './syndrome-table';
