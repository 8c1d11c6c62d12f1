// Solvability analysis via inversion parity
//
// Sliding a tile horizontally keeps the row-major order of tiles intact.
// Sliding vertically moves one tile past N-1 others. With odd N that never
// changes inversion parity; with even N it flips it while the blank changes
// row, so the blank's row from the bottom has to be folded in.

import type { Position, ReadonlyBoard } from '../types';
import { BLANK } from '../types';

// Row-major tiles without the blank
export function flattenTiles(board: ReadonlyBoard): number[] {
  const tiles: number[] = [];
  for (const row of board) {
    for (const value of row) {
      if (value !== BLANK) tiles.push(value);
    }
  }
  return tiles;
}

// Brute force over all pairs; at most 35 tiles for the largest board
export function countInversions(tiles: readonly number[]): number {
  let inversions = 0;
  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[i] > tiles[j]) inversions++;
    }
  }
  return inversions;
}

export function findBlank(board: ReadonlyBoard): Position | null {
  for (let row = 0; row < board.length; row++) {
    const col = board[row].indexOf(BLANK);
    if (col !== -1) return { row, col };
  }
  return null;
}

export function checkSolvability(board: ReadonlyBoard): boolean {
  const size = board.length;

  // A board without a blank cannot be played at all
  const blank = findBlank(board);
  if (!blank) return false;

  const inversions = countInversions(flattenTiles(board));

  if (size % 2 === 1) {
    return inversions % 2 === 0;
  }

  const blankFromBottom = size - blank.row;
  return (inversions + blankFromBottom) % 2 === 1;
}
