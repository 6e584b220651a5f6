export type CellAddress = string;
export type CellValue = string | number;

const A1_PATTERN = /^([A-Za-z]{1,3})([1-9][0-9]*)$/;

export function columnToLetter(column: number): string {
  if (!Number.isInteger(column) || column < 1) {
    throw new RangeError(`Column must be a positive integer, got ${column}`);
  }

  let remaining = column;
  let letters = '';
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

export function letterToColumn(letters: string): number {
  if (!/^[A-Za-z]+$/.test(letters)) {
    throw new RangeError(`Invalid column letters: "${letters}"`);
  }

  return [...letters.toUpperCase()].reduce(
    (column, letter) => column * 26 + (letter.charCodeAt(0) - 64),
    0,
  );
}

export function cellAddress(row: number, column: number): CellAddress {
  if (!Number.isInteger(row) || row < 1) {
    throw new RangeError(`Row must be a positive integer, got ${row}`);
  }
  return `${columnToLetter(column)}${row}`;
}

export function parseCellAddress(address: CellAddress): {
  row: number;
  column: number;
} {
  const match = A1_PATTERN.exec(address.trim());
  if (!match) {
    throw new RangeError(`Invalid A1 cell address: "${address}"`);
  }
  return { row: Number(match[2]), column: letterToColumn(match[1]) };
}

/**
 * Prefixes `range` with a quoted worksheet title. Without a title the range
 * targets the first worksheet.
 */
export function qualifyRange(
  worksheet: string | undefined,
  range: string,
): string {
  if (!worksheet) {
    return range;
  }
  return `'${worksheet.replace(/'/g, "''")}'!${range}`;
}
