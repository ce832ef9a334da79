/**
 * Error types raised by the grid model and the draw engine.
 *
 * Events that arrive with no gesture to act on are not errors: the engine
 * ignores them and reports `false` instead of throwing.
 */

/**
 * Base class for all cellsketch errors.
 */
export class CellSketchError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "CellSketchError"
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Thrown when a coordinate falls outside the grid. The engine never clamps;
 * the pointer source must only forward cells inside the canvas.
 */
export class OutOfBoundsError extends CellSketchError {
  constructor(
    public readonly x: number,
    public readonly y: number,
    public readonly width: number,
    public readonly height: number,
  ) {
    super(`Cell (${x}, ${y}) is outside the ${width}x${height} grid`)
    this.name = "OutOfBoundsError"
  }
}

/**
 * Thrown when a value that should be a single printable character is not.
 */
export class InvalidCharacterError extends CellSketchError {
  constructor(public readonly value: unknown) {
    super(`Expected a single printable character, got ${typeof value === "string" ? JSON.stringify(value) : String(value)}`)
    this.name = "InvalidCharacterError"
  }
}

/**
 * Thrown when grid dimensions are invalid or do not match.
 */
export class GridShapeError extends CellSketchError {
  constructor(
    message: string,
    public readonly expected: { width: number; height: number } | null,
    public readonly actual: { width: number; height: number },
  ) {
    super(message)
    this.name = "GridShapeError"
  }
}

export function isCellSketchError(error: unknown): error is CellSketchError {
  return error instanceof CellSketchError
}

export function isOutOfBoundsError(error: unknown): error is OutOfBoundsError {
  return error instanceof OutOfBoundsError
}

export function isInvalidCharacterError(error: unknown): error is InvalidCharacterError {
  return error instanceof InvalidCharacterError
}

export function isGridShapeError(error: unknown): error is GridShapeError {
  return error instanceof GridShapeError
}
