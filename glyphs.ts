export const BLANK = " "

export const HORIZONTAL = "─"
export const VERTICAL = "│"

export const TOP_LEFT = "┌"
export const TOP_RIGHT = "┐"
export const BOTTOM_LEFT = "└"
export const BOTTOM_RIGHT = "┘"

// Direction of a drag along one axis, from anchor to current point
export type Sign = 1 | -1

type CornerTable = Record<`${Sign},${Sign}`, string>

// Horizontal run from the anchor, then a vertical run to the end point.
// Right-then-down bends into the left and bottom arms, hence ┐.
const HORIZONTAL_FIRST_CORNERS: CornerTable = {
  "1,1": TOP_RIGHT,
  "1,-1": BOTTOM_RIGHT,
  "-1,1": TOP_LEFT,
  "-1,-1": BOTTOM_LEFT,
}

// Vertical run from the anchor, then a horizontal run to the end point.
const VERTICAL_FIRST_CORNERS: CornerTable = {
  "1,1": BOTTOM_LEFT,
  "1,-1": TOP_LEFT,
  "-1,1": BOTTOM_RIGHT,
  "-1,-1": TOP_RIGHT,
}

export function bendGlyph(dx: Sign, dy: Sign, horizontalFirst: boolean): string {
  const table = horizontalFirst ? HORIZONTAL_FIRST_CORNERS : VERTICAL_FIRST_CORNERS
  return table[`${dx},${dy}`]
}

// Control, format, surrogate and unassigned code points, combining marks,
// and the line and paragraph separators
const NON_PRINTABLE = /[\p{C}\p{M}\p{Zl}\p{Zp}]/u

// Exactly one code point that takes a cell of its own. The blank counts.
export function isPrintableChar(value: unknown): value is string {
  return typeof value === "string" && [...value].length === 1 && !NON_PRINTABLE.test(value)
}
