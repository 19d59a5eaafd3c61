import { describe, test, expect } from 'vitest';
import { BitMatrix, transpose } from '../../../src/fec/golay/bit-matrix';
import { buildGenerator, loadParity } from '../../../src/fec/golay/code-builder';
import {
  EXTENDED_PARITY_ROWS,
  EXTENDED_PARITY_WIDTH,
  STANDARD_PARITY_ROWS,
  STANDARD_PARITY_WIDTH
} from '../../../src/fec/golay/constants';
import {
  DimensionMismatchError,
  ParityCheckViolationError,
  RankDeficiencyError,
  ShapeError
} from '../../../src/fec/golay/errors';
import {
  deriveParityCheck,
  parityCheckIdentityForm,
  parityCheckTransposed,
  verifyParityCheck
} from '../../../src/fec/golay/parity-check';
import {
  EXTENDED_ALT_PARITY_CHECK,
  EXTENDED_PARITY_CHECK,
  STANDARD_PARITY_CHECK
} from './fixtures';

describe('Golay parity-check derivation', () => {
  const standard = loadParity(STANDARD_PARITY_ROWS, STANDARD_PARITY_WIDTH);
  const extended = loadParity(EXTENDED_PARITY_ROWS, EXTENDED_PARITY_WIDTH);

  describe('parityCheckTransposed', () => {
    test('should reproduce the 11x23 standard parity check bit for bit', () => {
      const h = parityCheckTransposed(standard);
      expect(h.rows).toBe(11);
      expect(h.columns).toBe(23);
      expect(h.toPackedRows()).toEqual(STANDARD_PARITY_CHECK);
    });

    test('should reproduce the 12x24 extended parity check', () => {
      const h = parityCheckTransposed(extended);
      expect(h.rows).toBe(12);
      expect(h.columns).toBe(24);
      expect(h.toPackedRows()).toEqual(EXTENDED_PARITY_CHECK);
    });

    test('top 12 rows of Hᵀ should equal the parity block', () => {
      const ht = transpose(parityCheckTransposed(standard));
      expect(ht.toPackedRows().slice(0, 12)).toEqual([...STANDARD_PARITY_ROWS]);
    });
  });

  describe('parityCheckIdentityForm', () => {
    test('should equal the extended generator', () => {
      const h = parityCheckIdentityForm(extended);
      expect(h.toPackedRows()).toEqual(EXTENDED_ALT_PARITY_CHECK);
      expect(h.equals(buildGenerator(extended))).toBe(true);
    });

    test('should reject a non-square parity block', () => {
      expect(() => parityCheckIdentityForm(standard)).toThrow(ShapeError);
    });
  });

  describe('deriveParityCheck', () => {
    test('should select the requested form', () => {
      expect(deriveParityCheck(extended, 'identity').toPackedRows()).toEqual(EXTENDED_ALT_PARITY_CHECK);
      expect(deriveParityCheck(extended, 'transposed').toPackedRows()).toEqual(EXTENDED_PARITY_CHECK);
      expect(() => deriveParityCheck(standard, 'identity')).toThrow(ShapeError);
    });
  });

  describe('verifyParityCheck', () => {
    test('should accept G with both extended forms of H', () => {
      const generator = buildGenerator(extended);
      expect(() => verifyParityCheck(generator, parityCheckTransposed(extended))).not.toThrow();
      expect(() => verifyParityCheck(generator, parityCheckIdentityForm(extended))).not.toThrow();
    });

    test('should accept the standard G and H', () => {
      expect(() => verifyParityCheck(buildGenerator(standard), parityCheckTransposed(standard))).not.toThrow();
    });

    test('should reject a generator and parity check of different lengths', () => {
      expect(() => verifyParityCheck(buildGenerator(extended), parityCheckTransposed(standard)))
        .toThrow(DimensionMismatchError);
    });

    test('should name the first failing row and check', () => {
      // G·H'ᵀ[r][c] = A[r][c] + A'[r][c], so only the flipped entry fails
      const corrupted = standard.toArray();
      corrupted[2][5] ^= 1;
      const h = parityCheckTransposed(BitMatrix.fromRows(corrupted));

      let caught: unknown;
      try {
        verifyParityCheck(buildGenerator(standard), h);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ParityCheckViolationError);
      if (caught instanceof ParityCheckViolationError) {
        expect(caught.row).toBe(2);
        expect(caught.check).toBe(5);
        expect(caught.message).toBe('Generator row 2 fails parity check 5');
      }
    });

    test('should reject a rank-deficient generator', () => {
      const generator = BitMatrix.fromRows([[1, 0, 1, 1], [1, 0, 1, 1]]);
      const h = BitMatrix.fromRows([[1, 1, 0, 0]]);
      expect(() => verifyParityCheck(generator, h)).toThrow(RankDeficiencyError);
      expect(() => verifyParityCheck(generator, h)).toThrow('Matrix is not full rank (rank=1, expected=2)');
    });

    test('should reject a rank-deficient parity check', () => {
      const generator = BitMatrix.fromRows([[1, 0, 0, 0]]);
      const h = BitMatrix.fromRows([
        [0, 1, 0, 0],
        [0, 0, 1, 0],
        [0, 1, 1, 0]
      ]);
      expect(() => verifyParityCheck(generator, h)).toThrow(RankDeficiencyError);
      expect(() => verifyParityCheck(generator, h)).toThrow('Matrix is not full rank (rank=2, expected=3)');
    });
  });
});
