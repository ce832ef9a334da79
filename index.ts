export { DrawEngine } from "./engine"
export type {
  BrushCharacterUpdate,
  EngineEvent,
  PendingText,
  PointerInput,
  PointerKind,
  TextCommit,
  ToolSelection,
} from "./engine"
export { GridModel, DEFAULT_HEIGHT, DEFAULT_WIDTH } from "./grid"
export type { Cell, Grid, GridChange, GridDimensions } from "./grid"
export { TOOLS, isTool, toolForKey } from "./tools"
export type { Tool, ToolInfo } from "./tools"
export { BRUSH_PALETTE, isPaletteChar, paletteCoordinate } from "./brush-palette"
export type { PaletteCoordinate } from "./brush-palette"
export { elbowLine, rectangleOutline, textRun } from "./raster"
export type { Stamp } from "./raster"
export {
  BLANK,
  BOTTOM_LEFT,
  BOTTOM_RIGHT,
  HORIZONTAL,
  TOP_LEFT,
  TOP_RIGHT,
  VERTICAL,
  bendGlyph,
  isPrintableChar,
} from "./glyphs"
export { DEFAULT_BRUSH_CHAR } from "./options"
export type { DrawEngineOptions } from "./options"
export { createLogger, LOG_PREFIX } from "./logger"
export type { Logger } from "./logger"
export {
  CellSketchError,
  GridShapeError,
  InvalidCharacterError,
  OutOfBoundsError,
  isCellSketchError,
  isGridShapeError,
  isInvalidCharacterError,
  isOutOfBoundsError,
} from "./errors"
