import { CellSketchError, InvalidCharacterError } from "./errors"
import { isPrintableChar } from "./glyphs"
import { DEFAULT_HEIGHT, DEFAULT_WIDTH, GridModel, assertDimensions } from "./grid"
import { createLogger, debugFromEnv, type Logger } from "./logger"
import { isTool, type Tool } from "./tools"

export const DEFAULT_BRUSH_CHAR = "x"

export interface DrawEngineOptions {
  // Ignored when `grid` is given
  width?: number
  height?: number
  grid?: GridModel
  brushChar?: string
  tool?: Tool
  debug?: boolean
  logger?: Logger
}

export interface ResolvedOptions {
  grid: GridModel
  brushChar: string
  tool: Tool
  logger: Logger
}

export function resolveOptions(options: DrawEngineOptions = {}): ResolvedOptions {
  const brushChar = options.brushChar ?? DEFAULT_BRUSH_CHAR
  if (!isPrintableChar(brushChar)) {
    throw new InvalidCharacterError(brushChar)
  }

  const tool = options.tool ?? "pencil"
  if (!isTool(tool)) {
    throw new CellSketchError(`Unknown tool: ${String(tool)}`)
  }

  let grid = options.grid
  if (!grid) {
    const width = options.width ?? DEFAULT_WIDTH
    const height = options.height ?? DEFAULT_HEIGHT
    assertDimensions(width, height)
    grid = new GridModel({ width, height })
  }

  return {
    grid,
    brushChar,
    tool,
    logger: options.logger ?? createLogger(options.debug ?? debugFromEnv()),
  }
}
