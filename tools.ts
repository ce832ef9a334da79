const TOOL_IDS = ["pencil", "eraser", "rectangle", "line", "text"] as const

export type Tool = (typeof TOOL_IDS)[number]

export interface ToolInfo {
  name: string
  key: string
}

export const TOOLS: Record<Tool, ToolInfo> = {
  pencil: { name: "Pencil", key: "P" },
  eraser: { name: "Eraser", key: "E" },
  rectangle: { name: "Rectangle", key: "R" },
  line: { name: "Line", key: "L" },
  text: { name: "Text", key: "T" },
}

export function isTool(value: unknown): value is Tool {
  return typeof value === "string" && TOOL_IDS.some(tool => tool === value)
}

// Tool bound to a hotkey, case-insensitive.
export function toolForKey(key: string): Tool | null {
  const upper = key.toUpperCase()
  return TOOL_IDS.find(tool => TOOLS[tool].key === upper) ?? null
}
