/**
 * Golay generator parity sub-matrices (A in G = [ I | A ])
 *
 * Pieced together from the P25 and DMR standards and appendix Q of IRIG 106.
 * Rows are packed MSB-first: the leftmost binary digit is column 0.
 */

/** 12×12 parity block of the (24, 12, 8) extended code */
export const EXTENDED_PARITY_ROWS = [
  0b110001110101,
  0b011000111011,
  0b111101101000,
  0b011110110100,
  0b001111011010,
  0b110110011001,
  0b011011001101,
  0b001101100111,
  0b110111000110,
  0b101010010111,
  0b100100111110,
  0b100011101011,
] as const;

export const EXTENDED_PARITY_WIDTH = 12;

/** 12×11 parity block of the (23, 12, 7) standard code: the extended block minus its rightmost column */
export const STANDARD_PARITY_ROWS = [
  0b11000111010,
  0b01100011101,
  0b11110110100,
  0b01111011010,
  0b00111101101,
  0b11011001100,
  0b01101100110,
  0b00110110011,
  0b11011100011,
  0b10101001011,
  0b10010011111,
  0b10001110101,
] as const;

export const STANDARD_PARITY_WIDTH = 11;

/** Data bits per codeword for both codes */
export const GOLAY_DATA_BITS = 12;
