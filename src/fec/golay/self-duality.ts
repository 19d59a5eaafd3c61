import { dot, type BitMatrix } from './bit-matrix';
import { SelfDualityViolationError } from './errors';

/**
 * Require every pair of generator rows, each row with itself included, to be orthogonal.
 * Throws on the first failing pair (r, q) with r ≤ q.
 *
 * Only meaningful for the extended code: the standard generator has odd-weight rows
 * and fails at (0, 0).
 */
export function verifySelfDual(generator: BitMatrix): void {
  const rows = Array.from({ length: generator.rows }, (_, r) => generator.row(r));
  for (let r = 0; r < rows.length; r++) {
    for (let q = r; q < rows.length; q++) {
      if (dot(rows[r], rows[q]) !== 0) {
        throw new SelfDualityViolationError(r, q);
      }
    }
  }
}
