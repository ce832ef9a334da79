import type { Cell } from "./grid"
import {
  BOTTOM_LEFT,
  BOTTOM_RIGHT,
  HORIZONTAL,
  TOP_LEFT,
  TOP_RIGHT,
  VERTICAL,
  bendGlyph,
} from "./glyphs"

export interface Stamp {
  x: number
  y: number
  char: string
}

interface Bounds {
  sx: number
  sy: number
  ex: number
  ey: number
}

function bounds(from: Cell, to: Cell): Bounds {
  return {
    sx: Math.min(from.x, to.x),
    sy: Math.min(from.y, to.y),
    ex: Math.max(from.x, to.x),
    ey: Math.max(from.y, to.y),
  }
}

// Collects stamps, one per cell. A later write to a cell replaces the
// earlier one, so corners can be laid over the straight runs.
class StampSet {
  private stamps = new Map<string, Stamp>()

  put(x: number, y: number, char: string): void {
    this.stamps.set(`${x},${y}`, { x, y, char })
  }

  row(y: number, fromX: number, toX: number, char: string): void {
    for (let x = fromX; x <= toX; x++) this.put(x, y, char)
  }

  column(x: number, fromY: number, toY: number, char: string): void {
    for (let y = fromY; y <= toY; y++) this.put(x, y, char)
  }

  toArray(): Stamp[] {
    return [...this.stamps.values()]
  }
}

// Outline of the box spanned by two opposite corners. A box one cell high or
// wide collapses to a single straight run with no corner glyphs; a single
// cell produces nothing.
export function rectangleOutline(from: Cell, to: Cell): Stamp[] {
  const { sx, sy, ex, ey } = bounds(from, to)
  const out = new StampSet()

  if (sx !== ex) {
    out.row(sy, sx, ex, HORIZONTAL)
    out.row(ey, sx, ex, HORIZONTAL)
  }
  if (sy !== ey) {
    out.column(sx, sy, ey, VERTICAL)
    out.column(ex, sy, ey, VERTICAL)
  }
  if (sx !== ex && sy !== ey) {
    out.put(sx, sy, TOP_LEFT)
    out.put(sx, ey, BOTTOM_LEFT)
    out.put(ex, sy, TOP_RIGHT)
    out.put(ex, ey, BOTTOM_RIGHT)
  }

  return out.toArray()
}

// Orthogonal line from `from` to `to` with one bend.
// With `horizontalFirst` the line leaves the anchor along its row and turns
// at the end point's column; otherwise it leaves along the anchor's column
// and turns at the end point's row.
export function elbowLine(from: Cell, to: Cell, horizontalFirst: boolean): Stamp[] {
  const { sx, sy, ex, ey } = bounds(from, to)
  const out = new StampSet()

  const row = horizontalFirst ? from.y : to.y
  const column = horizontalFirst ? to.x : from.x

  if (sx !== ex) {
    out.row(row, sx, ex, HORIZONTAL)
  }
  if (sy !== ey) {
    out.column(column, sy, ey, VERTICAL)
  }
  if (sx !== ex && sy !== ey) {
    const dx = to.x > from.x ? 1 : -1
    const dy = to.y > from.y ? 1 : -1
    out.put(column, row, bendGlyph(dx, dy, horizontalFirst))
  }

  return out.toArray()
}

// One stamp per character of `text`, left to right from the anchor.
export function textRun(anchor: Cell, text: string): Stamp[] {
  return [...text].map((char, i) => ({ x: anchor.x + i, y: anchor.y, char }))
}
