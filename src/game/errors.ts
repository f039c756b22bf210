export class GridInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridInvariantError";
  }
}

export class InvalidSizeError extends Error {
  constructor(readonly size: number) {
    super(`Puzzle size must be an integer of at least 2, got ${size}`);
    this.name = "InvalidSizeError";
  }
}
