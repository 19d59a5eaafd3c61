/**
 * Known-good packed tables (MSB-first) used as regression fixtures
 */

/** Standard code H = [ Aᵀ | I₁₁ ], 11×23 */
export const STANDARD_PARITY_CHECK = [
  0b10100100111110000000000,
  0b11110110100001000000000,
  0b01111011010000100000000,
  0b00111101101000010000000,
  0b00011110110100001000000,
  0b10101011100100000100000,
  0b11110001001100000010000,
  0b11011100011000000001000,
  0b01101110001100000000100,
  0b10010011111000000000010,
  0b01001001111100000000001,
];

/** Standard code single-error syndromes, entry i for data bit i */
export const STANDARD_SYNDROMES = [
  0b10001110101,
  0b10010011111,
  0b10101001011,
  0b11011100011,
  0b00110110011,
  0b01101100110,
  0b11011001100,
  0b00111101101,
  0b01111011010,
  0b11110110100,
  0b01100011101,
  0b11000111010,
];

/** Standard code Aᵀ, 11×12 */
export const STANDARD_PARITY_TRANSPOSE = [
  0b101001001111,
  0b111101101000,
  0b011110110100,
  0b001111011010,
  0b000111101101,
  0b101010111001,
  0b111100010011,
  0b110111000110,
  0b011011100011,
  0b100100111110,
  0b010010011111,
];

/** Extended code Aᵀ, 12×12 */
export const EXTENDED_PARITY_TRANSPOSE = [
  ...STANDARD_PARITY_TRANSPOSE,
  0b110001110101,
];

/** Extended code H = [ Aᵀ | I₁₂ ], 12×24 */
export const EXTENDED_PARITY_CHECK = [
  0b101001001111100000000000,
  0b111101101000010000000000,
  0b011110110100001000000000,
  0b001111011010000100000000,
  0b000111101101000010000000,
  0b101010111001000001000000,
  0b111100010011000000100000,
  0b110111000110000000010000,
  0b011011100011000000001000,
  0b100100111110000000000100,
  0b010010011111000000000010,
  0b110001110101000000000001,
];

/** Extended code H = [ I₁₂ | A ], which is also G */
export const EXTENDED_ALT_PARITY_CHECK = [
  0b100000000000110001110101,
  0b010000000000011000111011,
  0b001000000000111101101000,
  0b000100000000011110110100,
  0b000010000000001111011010,
  0b000001000000110110011001,
  0b000000100000011011001101,
  0b000000010000001101100111,
  0b000000001000110111000110,
  0b000000000100101010010111,
  0b000000000010100100111110,
  0b000000000001100011101011,
];
