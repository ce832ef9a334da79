import { GridShapeError, InvalidCharacterError, OutOfBoundsError } from "./errors"
import { BLANK, isPrintableChar } from "./glyphs"

export const DEFAULT_WIDTH = 80
export const DEFAULT_HEIGHT = 24

// Row-major: grid[y][x]
export type Grid = string[][]

export interface Cell {
  x: number
  y: number
}

export type GridChange =
  | { kind: "cell"; x: number; y: number; char: string }
  | { kind: "replace" }

type ChangeListener = (change: GridChange) => void

export interface GridDimensions {
  width: number
  height: number
}

export function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new GridShapeError(
      `Grid dimensions must be positive integers, got ${width}x${height}`,
      null,
      { width, height },
    )
  }
}

function blankGrid(width: number, height: number): Grid {
  return Array.from({ length: height }, () => new Array<string>(width).fill(BLANK))
}

// Fixed-size character buffer. Every cell holds one printable character;
// coordinates outside the grid are rejected, never clamped.
export class GridModel {
  readonly width: number
  readonly height: number

  private cells: Grid
  private dirty = false
  private listeners = new Set<ChangeListener>()

  constructor({ width = DEFAULT_WIDTH, height = DEFAULT_HEIGHT }: Partial<GridDimensions> = {}) {
    assertDimensions(width, height)
    this.width = width
    this.height = height
    this.cells = blankGrid(width, height)
  }

  // Parse the output of GridModel.toText back into a model.
  static fromText(text: string): GridModel {
    const lines = text.split("\n").map(line => [...line])
    const width = lines[0]?.length ?? 0
    const ragged = lines.find(line => line.length !== width)
    if (ragged) {
      throw new GridShapeError(
        "Every line must have the same length",
        { width, height: lines.length },
        { width: ragged.length, height: lines.length },
      )
    }
    const model = new GridModel({ width, height: lines.length })
    model.replace(lines)
    model.markClean()
    return model
  }

  // ==================== Cells ====================

  contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height
  }

  assertInBounds(x: number, y: number): void {
    if (!this.contains(x, y)) {
      throw new OutOfBoundsError(x, y, this.width, this.height)
    }
  }

  get(x: number, y: number): string {
    this.assertInBounds(x, y)
    return this.cells[y]![x]!
  }

  set(x: number, y: number, char: string): void {
    this.assertInBounds(x, y)
    if (!isPrintableChar(char)) {
      throw new InvalidCharacterError(char)
    }
    this.cells[y]![x] = char
    this.requestRender({ kind: "cell", x, y, char })
  }

  clear(): void {
    this.cells = blankGrid(this.width, this.height)
    this.requestRender({ kind: "replace" })
  }

  // ==================== Snapshots ====================

  snapshot(): Grid {
    return this.cells.map(row => [...row])
  }

  replace(grid: Grid): void {
    if (grid.length !== this.height || grid.some(row => row.length !== this.width)) {
      const width = grid.find(row => row.length !== this.width)?.length ?? this.width
      throw new GridShapeError(
        `Expected a ${this.width}x${this.height} grid`,
        { width: this.width, height: this.height },
        { width, height: grid.length },
      )
    }
    for (const row of grid) {
      const bad = row.find(char => !isPrintableChar(char))
      if (bad !== undefined) {
        throw new InvalidCharacterError(bad)
      }
    }
    this.cells = grid.map(row => [...row])
    this.requestRender({ kind: "replace" })
  }

  toText(): string {
    return this.cells.map(row => row.join("")).join("\n")
  }

  // ==================== Change Tracking ====================

  get isDirty(): boolean {
    return this.dirty
  }

  markClean(): void {
    this.dirty = false
  }

  // Subscribe to cell and whole-buffer changes.
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private requestRender(change: GridChange): void {
    this.dirty = true
    this.listeners.forEach(fn => fn(change))
  }
}
