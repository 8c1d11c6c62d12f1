import type {
  Board,
  Clock,
  Difficulty,
  GenerationOptions,
  Position,
  ReadonlyBoard,
  Rng
} from '../puzzle/types';
import { BLANK, DIRECTION_OFFSETS, cloneBoard, difficultyForSize } from '../puzzle/types';
import { findBlank, validateBoard } from '../puzzle/analysis';
import { generateBoard, sizeForDifficulty, validateSize } from '../puzzle/generator';
import { InvalidBoardError } from '../puzzle/errors';
import { systemClock } from '../puzzle/utils/Clock';

export interface PuzzleStats {
  moves: number;
  startedAt: number;  // epoch ms
}

export interface FromBoardOptions {
  clock?: Clock;
  rng?: Rng;
}

// Queries only; what a session hands to its host
export type PuzzleView = Pick<
  PuzzleState,
  'board' | 'blank' | 'moves' | 'startedAt' | 'difficulty' | 'size' |
  'tileAt' | 'isInBounds' | 'canMove' | 'movableCells' | 'isSolved' | 'elapsedTime'
>;

// Board, blank position and stats for one puzzle.
// The blank is cached and updated together with every board write.
export class PuzzleState {
  private grid: Board;
  private blankPos: Position;
  private stats: PuzzleStats;
  private currentDifficulty: Difficulty | null;
  private readonly rng: Rng;
  private readonly clock: Clock;

  private constructor(board: Board, blank: Position, difficulty: Difficulty | null, rng: Rng, clock: Clock) {
    this.grid = board;
    this.blankPos = blank;
    this.currentDifficulty = difficulty;
    this.rng = rng;
    this.clock = clock;
    this.stats = { moves: 0, startedAt: clock.now() };
  }

  // ============= Construction =============

  static generate(difficulty: Difficulty, options: GenerationOptions = {}): PuzzleState {
    const size = options.size !== undefined ? validateSize(options.size) : sizeForDifficulty(difficulty);
    const rng = options.rng ?? Math.random;
    const clock = options.clock ?? systemClock;
    const { board, blank } = generateBoard(size, rng);
    // A size override names its own difficulty, or none
    const label = options.size !== undefined ? difficultyForSize(size) : difficulty;
    return new PuzzleState(board, blank, label, rng, clock);
  }

  // Adopt an explicit arrangement (custom puzzles, tests)
  static fromBoard(rows: ReadonlyBoard, options: FromBoardOptions = {}): PuzzleState {
    validateBoard(rows);
    const board = cloneBoard(rows);
    const blank = findBlank(board);
    if (!blank) {
      throw new InvalidBoardError('Board has no blank cell');
    }
    return new PuzzleState(
      board,
      blank,
      difficultyForSize(board.length),
      options.rng ?? Math.random,
      options.clock ?? systemClock
    );
  }

  // ============= Accessors =============

  get board(): ReadonlyBoard {
    return this.grid;
  }

  get blank(): Position {
    return { ...this.blankPos };
  }

  get moves(): number {
    return this.stats.moves;
  }

  get startedAt(): number {
    return this.stats.startedAt;
  }

  get difficulty(): Difficulty | null {
    return this.currentDifficulty;
  }

  get size(): number {
    return this.grid.length;
  }

  tileAt(row: number, col: number): number | null {
    if (!this.isInBounds(row, col)) return null;
    return this.grid[row][col];
  }

  isInBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.size && col >= 0 && col < this.size;
  }

  // ============= Moves =============

  canMove(row: number, col: number): boolean {
    if (!this.isInBounds(row, col)) return false;
    if (this.grid[row][col] === BLANK) return false;

    const rowDiff = Math.abs(row - this.blankPos.row);
    const colDiff = Math.abs(col - this.blankPos.col);
    return rowDiff + colDiff === 1;
  }

  move(row: number, col: number): boolean {
    if (!this.canMove(row, col)) return false;

    const { row: blankRow, col: blankCol } = this.blankPos;
    this.grid[blankRow][blankCol] = this.grid[row][col];
    this.grid[row][col] = BLANK;
    this.blankPos = { row, col };
    this.stats.moves++;
    return true;
  }

  // Neighbours of the blank that could slide into it: up, down, left, right
  movableCells(): Position[] {
    const cells: Position[] = [];
    for (const offset of Object.values(DIRECTION_OFFSETS)) {
      const row = this.blankPos.row + offset.row;
      const col = this.blankPos.col + offset.col;
      if (this.isInBounds(row, col)) cells.push({ row, col });
    }
    return cells;
  }

  // ============= Status =============

  isSolved(): boolean {
    const size = this.size;
    const last = size * size - 1;

    for (let row = 0; row < size; row++) {
      for (let col = 0; col < size; col++) {
        const index = row * size + col;
        const expected = index === last ? BLANK : index + 1;
        if (this.grid[row][col] !== expected) return false;
      }
    }
    return true;
  }

  // Milliseconds since generation; follows the wall clock, jumps included
  elapsedTime(): number {
    return this.clock.now() - this.stats.startedAt;
  }

  // ============= Lifecycle =============

  // Same size and difficulty, fresh shuffle
  restart(): void {
    this.regenerate(this.size, this.currentDifficulty);
  }

  changeDifficulty(difficulty: Difficulty): void {
    this.regenerate(sizeForDifficulty(difficulty), difficulty);
  }

  private regenerate(size: number, difficulty: Difficulty | null): void {
    const { board, blank } = generateBoard(size, this.rng);
    this.grid = board;
    this.blankPos = blank;
    this.currentDifficulty = difficulty;
    this.stats = { moves: 0, startedAt: this.clock.now() };
  }
}
