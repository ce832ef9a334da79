import brushChars from "./brush-chars.json"

export interface PaletteCoordinate {
  row: number
  col: number
}

// Characters offered by the brush picker, in display order
export const BRUSH_PALETTE: readonly (readonly string[])[] = brushChars

// Position of `char` in the picker, used to place its cursor on open.
// The first occurrence wins when a character is listed twice.
export function paletteCoordinate(char: string): PaletteCoordinate | null {
  for (let row = 0; row < BRUSH_PALETTE.length; row++) {
    const col = BRUSH_PALETTE[row]!.indexOf(char)
    if (col !== -1) return { row, col }
  }
  return null
}

export function isPaletteChar(char: string): boolean {
  return paletteCoordinate(char) !== null
}
