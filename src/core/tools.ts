/**
 * Tool Registry and Gesture Handlers
 *
 * Every tool is a variant of the closed `Tool` union. Each variant carries
 * its own transient gesture state plus the primary color it commits with.
 * Behavior hooks (start, move, end, cancel) switch over the variant, so
 * adding a tool means adding one registry entry, one interface and one
 * case per hook.
 */
import type { Color } from "./color";
import { type Shape, circle, rectangle } from "./shapes";
import type { Point } from "./types";

// ============================================================
// Registry
// ============================================================

export interface ToolInfo {
  id: string;
  name: string;
  hotkey: string;
}

export const tools = [
  { id: "brush", name: "Brush", hotkey: "b" },
  { id: "rectangle", name: "Rectangle", hotkey: "r" },
] as const satisfies readonly ToolInfo[];

export type ToolId = (typeof tools)[number]["id"];

export function isToolId(value: string): value is ToolId {
  return tools.some((t) => t.id === value);
}

/**
 * Get a tool by hotkey
 */
export function getToolByHotkey(key: string): ToolInfo | undefined {
  return tools.find((t) => t.hotkey === key.toLowerCase());
}

// ============================================================
// Tool State
// ============================================================

/** Commits one dab per pointer sample */
export interface BrushTool {
  readonly id: "brush";
  color: Color;
  radius: number;
}

/** Anchor is set between gesture start and end */
export interface RectangleTool {
  readonly id: "rectangle";
  color: Color;
  anchor: Point | null;
}

export type Tool = BrushTool | RectangleTool;

export interface ToolOptions {
  brushRadius: number;
}

export function createTool(id: ToolId, color: Color, options: ToolOptions): Tool {
  switch (id) {
    case "brush":
      return { id, color, radius: options.brushRadius };
    case "rectangle":
      return { id, color, anchor: null };
  }
}

// ============================================================
// Tool Context
// ============================================================

/**
 * What a tool may touch. The controller owns both surfaces, so tools go
 * through these callbacks instead of holding a raster target.
 */
export interface ToolContext {
  commit(shape: Shape): void;
  showPreview(shape: Shape): void;
  clearPreview(): void;
}

// ============================================================
// Behavior Hooks
// ============================================================

export function startGesture(tool: Tool, tc: ToolContext, point: Point): void {
  switch (tool.id) {
    case "brush":
      tc.commit(circle(point.x, point.y, tool.radius, tool.color));
      break;
    case "rectangle":
      tool.anchor = { x: point.x, y: point.y };
      break;
  }
}

/**
 * Brush samples are not interpolated, so fast motion leaves gaps
 * between dabs.
 */
export function moveGesture(tool: Tool, tc: ToolContext, point: Point): void {
  switch (tool.id) {
    case "brush":
      tc.commit(circle(point.x, point.y, tool.radius, tool.color));
      break;
    case "rectangle":
      if (!tool.anchor) return;
      tc.showPreview(rectangle(tool.anchor.x, tool.anchor.y, point.x, point.y, tool.color));
      break;
  }
}

export function endGesture(tool: Tool, tc: ToolContext, point: Point): void {
  switch (tool.id) {
    case "brush":
      break;
    case "rectangle": {
      const anchor = tool.anchor;
      if (!anchor) return;
      tool.anchor = null;
      tc.clearPreview();
      tc.commit(rectangle(anchor.x, anchor.y, point.x, point.y, tool.color));
      break;
    }
  }
}

/**
 * Abandon an in-progress gesture without committing anything
 */
export function cancelGesture(tool: Tool, tc: ToolContext): void {
  switch (tool.id) {
    case "brush":
      break;
    case "rectangle":
      if (!tool.anchor) return;
      tool.anchor = null;
      tc.clearPreview();
      break;
  }
}

export function setPrimaryColor(tool: Tool, color: Color): void {
  tool.color = color;
}

/**
 * Neither tool uses a secondary color yet.
 */
export function setSecondaryColor(tool: Tool, _color: Color): void {
  switch (tool.id) {
    case "brush":
    case "rectangle":
      break;
  }
}
