// Errors raised for configuration and malformed input.
// Gameplay never throws: illegal moves report false instead.

export class PuzzleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PuzzleError {}

export class InvalidBoardError extends PuzzleError {}
