// Solved-board construction and parity repair

import type { Board } from '../types';
import { BLANK } from '../types';

// Row-major 1..N²-1 with the blank in the last cell
export function createSolvedBoard(size: number): Board {
  const board: Board = [];
  for (let row = 0; row < size; row++) {
    const cells: number[] = [];
    for (let col = 0; col < size; col++) {
      cells.push(row * size + col + 1);
    }
    board.push(cells);
  }
  board[size - 1][size - 1] = BLANK;
  return board;
}

// Swap the first two non-blank cells in row-major order.
// Flips inversion parity by exactly one; the blank is never touched.
export function repairParity(board: Board): boolean {
  const cells: Array<{ row: number; col: number }> = [];

  for (let row = 0; row < board.length && cells.length < 2; row++) {
    for (let col = 0; col < board[row].length && cells.length < 2; col++) {
      if (board[row][col] !== BLANK) cells.push({ row, col });
    }
  }

  if (cells.length < 2) return false;

  const [a, b] = cells;
  const tmp = board[a.row][a.col];
  board[a.row][a.col] = board[b.row][b.col];
  board[b.row][b.col] = tmp;
  return true;
}
