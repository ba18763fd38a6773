/**
 * @fileoverview Canonical hex+ASCII dump lines for block contents.
 */

export const HEX_DUMP_ROW_SIZE = 16;

const toAscii = (value: number): string =>
  value >= 0x20 && value <= 0x7e ? String.fromCharCode(value) : '.';

/**
 * Formats bytes as `OOOOOOOO  hh hh ..  |ascii|` rows.
 *
 * @param bytes - Data to dump
 * @param startOffset - Offset printed for the first byte
 * @param rowSize - Bytes per row
 */
export function formatHexDump(
  bytes: Uint8Array,
  startOffset = 0,
  rowSize = HEX_DUMP_ROW_SIZE
): string[] {
  const lines: string[] = [];
  for (let row = 0; row < bytes.length; row += rowSize) {
    const slice = bytes.subarray(row, Math.min(row + rowSize, bytes.length));
    const hexCells = Array.from(slice, (value) => value.toString(16).padStart(2, '0'));
    const hexPart = hexCells.join(' ').padEnd(rowSize * 3 - 1, ' ');
    const asciiPart = Array.from(slice, toAscii).join('');
    const offset = (startOffset + row).toString(16).padStart(8, '0');
    lines.push(`${offset}  ${hexPart}  |${asciiPart}|`);
  }
  return lines;
}
