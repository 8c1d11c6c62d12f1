// Random-walk shuffle: slides the blank around so every intermediate
// arrangement is reachable from the solved board by legal moves.

import type { Board, Direction, Position, Rng } from '../types';
import { BLANK, DIRECTION_OFFSETS } from '../types';
import { shuffleInPlace } from '../utils/Random';

export const SHUFFLE_STEPS_PER_CELL = 10;

const DIRECTIONS: Direction[] = ['right', 'left', 'down', 'up'];

export function shuffleSteps(size: number): number {
  return size * size * SHUFFLE_STEPS_PER_CELL;
}

// Walks the blank `steps` times, mutating `board`. Returns where the blank ended up.
export function randomWalk(board: Board, start: Position, steps: number, rng: Rng): Position {
  const size = board.length;
  let { row, col } = start;

  for (let i = 0; i < steps; i++) {
    const order = shuffleInPlace([...DIRECTIONS], rng);

    for (const dir of order) {
      const offset = DIRECTION_OFFSETS[dir];
      const nextRow = row + offset.row;
      const nextCol = col + offset.col;
      if (nextRow < 0 || nextRow >= size || nextCol < 0 || nextCol >= size) continue;

      board[row][col] = board[nextRow][nextCol];
      board[nextRow][nextCol] = BLANK;
      row = nextRow;
      col = nextCol;
      break;
    }
  }

  return { row, col };
}
