// Generator exports
export { createSolvedBoard, repairParity } from './BoardBuilder';
export { randomWalk, shuffleSteps, SHUFFLE_STEPS_PER_CELL } from './Shuffler';

import type { Difficulty, GeneratedBoard, Rng } from '../types';
import { DIFFICULTY_SIZES, isDifficulty } from '../types';
import { ConfigurationError, PuzzleError } from '../errors';
import { checkSolvability, countInversions, findBlank, flattenTiles } from '../analysis/Solvability';
import { createSolvedBoard, repairParity } from './BoardBuilder';
import { randomWalk, shuffleSteps } from './Shuffler';

export const MIN_BOARD_SIZE = 2;

export function validateSize(size: number): number {
  if (!Number.isInteger(size) || size < MIN_BOARD_SIZE) {
    throw new ConfigurationError(`Board size must be an integer >= ${MIN_BOARD_SIZE}, got ${size}`);
  }
  return size;
}

export function sizeForDifficulty(difficulty: Difficulty): number {
  if (!isDifficulty(difficulty)) {
    throw new ConfigurationError(`Unknown difficulty: ${String(difficulty)}`);
  }
  return DIFFICULTY_SIZES[difficulty];
}

// Generate a shuffled board that is guaranteed solvable
export function generateBoard(size: number, rng: Rng = Math.random): GeneratedBoard {
  validateSize(size);

  const board = createSolvedBoard(size);
  randomWalk(board, { row: size - 1, col: size - 1 }, shuffleSteps(size), rng);

  let repaired = false;

  // The walk only makes legal moves, so this should never trigger
  if (!checkSolvability(board)) {
    const inversions = countInversions(flattenTiles(board));
    repaired = repairParity(board);
    console.warn(`generateBoard: ${size}x${size} shuffle failed parity check (${inversions} inversions), repaired`);
  }

  return { board, blank: scanBlank(board), repaired };
}

function scanBlank(board: GeneratedBoard['board']): GeneratedBoard['blank'] {
  const blank = findBlank(board);
  if (!blank) {
    throw new PuzzleError('Generated board has no blank cell');
  }
  return blank;
}
