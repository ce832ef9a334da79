import { CellSketchError, InvalidCharacterError, OutOfBoundsError } from "./errors"
import { BLANK, isPrintableChar } from "./glyphs"
import type { Cell, GridModel } from "./grid"
import type { Logger } from "./logger"
import { resolveOptions, type DrawEngineOptions } from "./options"
import { elbowLine, rectangleOutline, textRun, type Stamp } from "./raster"
import { isTool, type Tool } from "./tools"

// ==================== Events ====================

export type PointerKind = "press" | "move" | "release" | "leave"

export interface PointerInput {
  type: "pointer"
  kind: PointerKind
  x: number
  y: number
  // Read by the line tool on press only
  modifier: boolean
}

export interface ToolSelection {
  type: "tool"
  tool: Tool
}

export interface BrushCharacterUpdate {
  type: "brush"
  char: string
}

export interface TextCommit {
  type: "text-commit"
  text: string
}

export type EngineEvent = PointerInput | ToolSelection | BrushCharacterUpdate | TextCommit

export interface PendingText {
  anchor: Cell
  // Longest text that still fits left of the right edge
  maxLength: number
}

// ==================== Gestures ====================

// Cells written by the current shape preview, each with the character the
// grid held before the gesture touched it. Restoring the frame puts the
// press-time grid back without keeping a copy of the whole buffer.
class PreviewFrame {
  private base = new Map<string, Stamp>()

  constructor(private grid: GridModel) {}

  restore(): void {
    for (const cell of this.base.values()) {
      this.grid.set(cell.x, cell.y, cell.char)
    }
    this.base.clear()
  }

  paint(stamps: Stamp[]): void {
    for (const { x, y, char } of stamps) {
      const key = `${x},${y}`
      if (!this.base.has(key)) {
        this.base.set(key, { x, y, char: this.grid.get(x, y) })
      }
      this.grid.set(x, y, char)
    }
  }

  redraw(stamps: Stamp[]): void {
    this.restore()
    this.paint(stamps)
  }

  // Write beneath the preview: a covered cell takes the new base character
  // and shows it once the preview moves off; an uncovered cell changes now
  writeBase(x: number, y: number, char: string): void {
    const cell = this.base.get(`${x},${y}`)
    if (cell) {
      cell.char = char
      return
    }
    this.grid.set(x, y, char)
  }
}

// Tool and modifier are fixed at press for the rest of the gesture
type Gesture =
  | { tool: "pencil" | "eraser" }
  | { tool: "rectangle"; anchor: Cell; frame: PreviewFrame }
  | { tool: "line"; anchor: Cell; horizontalFirst: boolean; frame: PreviewFrame }
  | { tool: "text"; anchor: Cell }

function assertNever(value: never): never {
  throw new CellSketchError(`Unhandled variant: ${JSON.stringify(value)}`)
}

// Turns pointer gestures, tool changes and committed text into writes on a
// GridModel.
// Every method that takes part in a gesture returns `true` when the event
// acted and `false` when it was ignored because there was nothing to act on
// (a move after release, a commit with no pending text).
export class DrawEngine {
  readonly grid: GridModel

  private currentTool: Tool
  private currentBrushChar: string
  private gesture: Gesture | null = null
  private pending: PendingText | null = null
  private readonly log: Logger

  constructor(options: DrawEngineOptions = {}) {
    const resolved = resolveOptions(options)
    this.grid = resolved.grid
    this.currentTool = resolved.tool
    this.currentBrushChar = resolved.brushChar
    this.log = resolved.logger
  }

  // ==================== State ====================

  get tool(): Tool {
    return this.currentTool
  }

  get brushChar(): string {
    return this.currentBrushChar
  }

  get isGestureActive(): boolean {
    return this.gesture !== null
  }

  get activeGestureTool(): Tool | null {
    return this.gesture?.tool ?? null
  }

  private get previewFrame(): PreviewFrame | null {
    const gesture = this.gesture
    if (gesture?.tool === "rectangle" || gesture?.tool === "line") return gesture.frame
    return null
  }

  get pendingText(): PendingText | null {
    if (!this.pending) return null
    return { anchor: { ...this.pending.anchor }, maxLength: this.pending.maxLength }
  }

  // ==================== Tool Management ====================

  // Select the tool for the next gesture. A gesture already under way keeps
  // the tool it started with.
  setTool(tool: Tool): void {
    if (!isTool(tool)) {
      throw new CellSketchError(`Unknown tool: ${String(tool)}`)
    }
    this.currentTool = tool
  }

  setBrushChar(char: string): void {
    if (!isPrintableChar(char)) {
      throw new InvalidCharacterError(char)
    }
    this.currentBrushChar = char
  }

  // ==================== Pointer Handling ====================

  press(x: number, y: number, modifier = false): boolean {
    this.grid.assertInBounds(x, y)

    if (this.gesture) {
      // Missed release: keep what the previous gesture drew
      this.log.warn(`press during active ${this.gesture.tool} gesture, ending it`)
      this.gesture = null
    }

    const tool = this.currentTool
    this.log.debug(`${tool} gesture start at (${x}, ${y})`)

    const gesture = this.startGesture(tool, { x, y }, modifier)
    this.gesture = gesture
    this.applyAt(gesture, x, y)
    return true
  }

  move(x: number, y: number): boolean {
    if (!this.gesture) {
      this.log.debug(`move to (${x}, ${y}) ignored, no active gesture`)
      return false
    }
    this.grid.assertInBounds(x, y)
    this.applyAt(this.gesture, x, y)
    return true
  }

  release(): boolean {
    return this.endGesture("release")
  }

  // Pointer left the canvas mid-drag; same as letting go
  leave(): boolean {
    return this.endGesture("leave")
  }

  // Abandon the current gesture. A shape preview is wiped, leaving the grid
  // as it was at press; freehand strokes and pending text are kept.
  cancel(): boolean {
    const gesture = this.gesture
    if (!gesture) {
      this.log.debug("cancel ignored, no active gesture")
      return false
    }
    if (gesture.tool === "rectangle" || gesture.tool === "line") {
      gesture.frame.restore()
    }
    this.gesture = null
    this.log.debug(`${gesture.tool} gesture cancelled`)
    return true
  }

  private endGesture(reason: "release" | "leave"): boolean {
    if (!this.gesture) {
      this.log.debug(`${reason} ignored, no active gesture`)
      return false
    }
    this.log.debug(`${this.gesture.tool} gesture end (${reason})`)
    this.gesture = null
    return true
  }

  private startGesture(tool: Tool, anchor: Cell, modifier: boolean): Gesture {
    switch (tool) {
      case "pencil":
      case "eraser":
        return { tool }
      case "rectangle":
        return { tool, anchor, frame: new PreviewFrame(this.grid) }
      case "line":
        return { tool, anchor, horizontalFirst: modifier, frame: new PreviewFrame(this.grid) }
      case "text":
        if (this.pending) {
          this.log.debug("uncommitted text insertion replaced")
        }
        this.pending = { anchor, maxLength: this.grid.width - anchor.x }
        return { tool, anchor }
      default:
        return assertNever(tool)
    }
  }

  private applyAt(gesture: Gesture, x: number, y: number): void {
    switch (gesture.tool) {
      case "pencil":
        this.grid.set(x, y, this.currentBrushChar)
        return
      case "eraser":
        this.grid.set(x, y, BLANK)
        return
      case "rectangle":
        gesture.frame.redraw(rectangleOutline(gesture.anchor, { x, y }))
        return
      case "line":
        gesture.frame.redraw(elbowLine(gesture.anchor, { x, y }, gesture.horizontalFirst))
        return
      case "text":
        // The insertion opened at press stays put while dragging
        return
      default:
        assertNever(gesture)
    }
  }

  // ==================== Text ====================

  // Stamp `text` at the pending anchor and close the insertion. Text that
  // would run past the right edge is rejected before anything is written,
  // and the insertion stays open.
  commitText(text: string): boolean {
    const pending = this.pending
    if (!pending) {
      this.log.debug("text commit ignored, no pending insertion")
      return false
    }

    const stamps = textRun(pending.anchor, text)
    if (stamps.length > pending.maxLength) {
      throw new OutOfBoundsError(
        pending.anchor.x + stamps.length - 1,
        pending.anchor.y,
        this.grid.width,
        this.grid.height,
      )
    }
    const bad = stamps.find(stamp => !isPrintableChar(stamp.char))
    if (bad) {
      throw new InvalidCharacterError(bad.char)
    }

    const frame = this.previewFrame
    for (const { x, y, char } of stamps) {
      if (frame) {
        frame.writeBase(x, y, char)
      } else {
        this.grid.set(x, y, char)
      }
    }
    this.pending = null
    this.log.debug(`committed ${stamps.length} characters at (${pending.anchor.x}, ${pending.anchor.y})`)
    return true
  }

  // ==================== Dispatch ====================

  dispatch(event: EngineEvent): boolean {
    switch (event.type) {
      case "pointer":
        return this.handlePointer(event)
      case "tool":
        this.setTool(event.tool)
        return true
      case "brush":
        this.setBrushChar(event.char)
        return true
      case "text-commit":
        return this.commitText(event.text)
      default:
        return assertNever(event)
    }
  }

  private handlePointer(event: PointerInput): boolean {
    switch (event.kind) {
      case "press":
        return this.press(event.x, event.y, event.modifier)
      case "move":
        return this.move(event.x, event.y)
      case "release":
        return this.release()
      case "leave":
        return this.leave()
      default:
        return assertNever(event.kind)
    }
  }

  // ==================== Export ====================

  exportText(): string {
    return this.grid.toText()
  }
}
