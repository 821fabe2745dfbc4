/**
 * Workbook styling helpers
 */

import type { Fill, Worksheet } from 'exceljs';

export const COLORS = {
  header: 'FF4472C4',
  critical: 'FFC5504B',
  high: 'FFFF6B35',
  medium: 'FFFFB347',
  low: 'FF90EE90',
  accent: 'FFE7E6E6',
} as const;

export type ColorName = keyof typeof COLORS;

const MAX_COLUMN_WIDTH = 50;

export function solidFill(color: ColorName): Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb: COLORS[color] } };
}

/**
 * "next_30_days" -> "Next 30 Days"
 */
export function titleCase(value: string): string {
  return value
    .replace(/_/g, ' ')
    .split(' ')
    .map((word) => (word.length > 0 ? word.charAt(0).toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

export function writeHeaderRow(sheet: Worksheet, headers: readonly string[], rowNumber: number): void {
  headers.forEach((header, index) => {
    const cell = sheet.getCell(rowNumber, index + 1);
    cell.value = header;
    cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    cell.fill = solidFill('header');
    cell.alignment = { horizontal: 'center' };
  });
}

export function writeHeading(sheet: Worksheet, address: string, text: string, size: number): void {
  const cell = sheet.getCell(address);
  cell.value = text;
  cell.font = { size, bold: true };
}

export function fillRow(sheet: Worksheet, rowNumber: number, columns: number, color: ColorName): void {
  for (let column = 1; column <= columns; column++) {
    sheet.getCell(rowNumber, column).fill = solidFill(color);
  }
}

/**
 * Size columns to their longest value (capped) and border every filled cell
 */
export function formatSheet(sheet: Worksheet): void {
  for (let index = 1; index <= sheet.columnCount; index++) {
    const column = sheet.getColumn(index);
    let maxLength = 0;
    column.eachCell({ includeEmpty: false }, (cell) => {
      maxLength = Math.max(maxLength, cell.text.length);
    });
    column.width = Math.min(maxLength + 2, MAX_COLUMN_WIDTH);
  }

  const thin = { style: 'thin' } as const;
  sheet.eachRow((row) => {
    row.eachCell((cell) => {
      cell.border = { top: thin, left: thin, bottom: thin, right: thin };
    });
  });
}
