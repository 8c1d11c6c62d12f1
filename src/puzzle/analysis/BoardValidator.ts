// Structural checks for boards that come from outside the generator

import type { ReadonlyBoard } from '../types';
import { InvalidBoardError } from '../errors';

export function validateBoard(board: ReadonlyBoard): void {
  const size = board.length;
  if (size < 2) {
    throw new InvalidBoardError(`Board must be at least 2x2, got ${size} row(s)`);
  }

  const seen = new Set<number>();
  const cellCount = size * size;

  board.forEach((row, r) => {
    if (row.length !== size) {
      throw new InvalidBoardError(`Row ${r} has ${row.length} cells, expected ${size}`);
    }
    for (const value of row) {
      if (!Number.isInteger(value) || value < 0 || value >= cellCount) {
        throw new InvalidBoardError(`Value ${value} is outside 0..${cellCount - 1}`);
      }
      if (seen.has(value)) {
        throw new InvalidBoardError(`Value ${value} appears more than once`);
      }
      seen.add(value);
    }
  });
}
