/**
 * Text rendering of generated Golay tables as binary literal lines ("0b0101,")
 * ready to paste into a decoder's constant tables.
 */

import { generateGolayTables, type GolayCodeType, type GolayTables, type PackedTable } from './index';

export function formatBinaryRow(value: number, width: number): string {
  return `0b${value.toString(2).padStart(width, '0')},`;
}

export function formatBinaryTable(table: PackedTable): string[] {
  return table.rows.map(row => formatBinaryRow(row, table.width));
}

function section(title: string, table: PackedTable | undefined): string[] {
  return table ? [`${title}:`, ...formatBinaryTable(table)] : [];
}

export function renderGolayTables(tables: GolayTables): string[] {
  if (tables.altParityCheck) {
    // 拡張Golay符号: Aᵀ, A, H, 代替H
    return [
      ...section('core transpose', tables.parityTranspose),
      ...section('core', tables.parity),
      ...section('parity check', tables.parityCheck),
      ...section('alt parity check', tables.altParityCheck)
    ];
  }
  return [
    ...section('core transpose', tables.parityTranspose),
    ...section('parity check', tables.parityCheck),
    ...section('parity check transpose', tables.parityCheckTranspose),
    ...section('syndromes', tables.syndromes)
  ];
}

/**
 * Generate the tables for one code and write them line by line
 */
export function printGolayTables(
  type: GolayCodeType,
  log: (line: string) => void = console.log
): void {
  const tables = generateGolayTables(type);
  console.log(`[GolayTables] Printing ${type} (n=${tables.n}, k=${tables.k}, d=${tables.minDistance})`);
  for (const line of renderGolayTables(tables)) {
    log(line);
  }
}
