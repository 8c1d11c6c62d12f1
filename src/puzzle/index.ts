// Puzzle System - Types, Generator, and Analysis

// Re-export types
export type {
  Board,
  ReadonlyBoard,
  Tile,
  Position,
  Difficulty,
  Direction,
  Rng,
  Clock,
  GenerationOptions,
  GeneratedBoard
} from './types';

export {
  BLANK,
  DIFFICULTIES,
  DIFFICULTY_SIZES,
  DIFFICULTY_LABELS,
  DIRECTION_OFFSETS,
  isDifficulty,
  difficultyForSize
} from './types';

export { PuzzleError, ConfigurationError, InvalidBoardError } from './errors';

// Generator API
export {
  generateBoard,
  createSolvedBoard,
  repairParity,
  randomWalk,
  sizeForDifficulty,
  validateSize,
  MIN_BOARD_SIZE
} from './generator';

// Analysis API
export { checkSolvability, countInversions, findBlank, validateBoard } from './analysis';

// Utilities
export { XorShift32, createSeededRng, shuffleInPlace } from './utils/Random';
export { systemClock, ManualClock, formatClock, formatPreciseClock } from './utils/Clock';
