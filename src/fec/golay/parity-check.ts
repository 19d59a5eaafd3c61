/**
 * Parity-check matrix derivation
 *
 * - Transposed form: H = [ Aᵀ | I_K ], the standard systematic parity check.
 * - Identity form:   H = [ I₁₂ | A ], which equals the generator itself. Only valid
 *   for the square extended block, where the code is self-dual and G is its own
 *   parity check.
 */

import { hstack, identity, matmul, rank, transpose, type BitMatrix } from './bit-matrix';
import { GOLAY_DATA_BITS } from './constants';
import { DimensionMismatchError, ParityCheckViolationError, RankDeficiencyError, ShapeError } from './errors';

export type ParityCheckForm = 'transposed' | 'identity';

export function parityCheckTransposed(parity: BitMatrix): BitMatrix {
  return hstack(transpose(parity), identity(parity.columns));
}

export function parityCheckIdentityForm(parity: BitMatrix): BitMatrix {
  if (parity.rows !== GOLAY_DATA_BITS || parity.columns !== GOLAY_DATA_BITS) {
    throw new ShapeError(`Identity-form parity check needs a ${GOLAY_DATA_BITS}x${GOLAY_DATA_BITS} parity block, got ${parity.rows}x${parity.columns}`);
  }
  return hstack(identity(parity.rows), parity);
}

export function deriveParityCheck(parity: BitMatrix, form: ParityCheckForm): BitMatrix {
  return form === 'identity' ? parityCheckIdentityForm(parity) : parityCheckTransposed(parity);
}

/**
 * Check that H is a full-rank parity check for the full-rank generator G, i.e. G · Hᵀ ≡ 0.
 */
export function verifyParityCheck(generator: BitMatrix, parityCheck: BitMatrix): void {
  if (generator.columns !== parityCheck.columns) {
    throw new DimensionMismatchError(`Generator has ${generator.columns} columns but parity check has ${parityCheck.columns}`);
  }

  const generatorRank = rank(generator);
  if (generatorRank !== generator.rows) {
    throw new RankDeficiencyError(generatorRank, generator.rows);
  }
  const parityCheckRank = rank(parityCheck);
  if (parityCheckRank !== parityCheck.rows) {
    throw new RankDeficiencyError(parityCheckRank, parityCheck.rows);
  }

  const product = matmul(generator, transpose(parityCheck));
  for (let r = 0; r < product.rows; r++) {
    for (let c = 0; c < product.columns; c++) {
      if (product.get(r, c) !== 0) {
        throw new ParityCheckViolationError(r, c);
      }
    }
  }
}
