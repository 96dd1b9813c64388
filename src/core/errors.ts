/**
 * Custom error classes for migsafe.
 */

export class MigsafeError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = "MigsafeError";
  }
}

export class PathNotFoundError extends MigsafeError {
  constructor(public readonly path: string) {
    super(`${path} not found`, 1);
    this.name = "PathNotFoundError";
  }
}
