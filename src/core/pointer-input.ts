/**
 * Pointer Input
 *
 * Turns DOM input into bus events:
 * - Mouse down/move/up on the drawing canvas become pointer samples in
 *   canvas-local coordinates. Leaving the canvas mid-gesture ends it there.
 * - Keyboard: tool hotkeys, Ctrl/Cmd+Z undo, Ctrl/Cmd+Shift+Z redo.
 *
 * Whether a move belongs to a gesture is the controller's call; every move
 * over the canvas is forwarded.
 */
import type { PointerKind } from "./types";
import { type EventBus, Events, bus as defaultBus } from "./event-bus";
import { type ToolId, getToolByHotkey, isToolId } from "./tools";

export class PointerInput {
  private canvas: HTMLElement;
  private bus: EventBus;
  private doc: Document;
  private currentTool: ToolId = "brush";
  private pressed = false;

  constructor(canvas: HTMLElement, bus: EventBus = defaultBus, doc: Document = document) {
    this.canvas = canvas;
    this.bus = bus;
    this.doc = doc;
    this.setupMouseListeners();
    this.setupKeyboardListeners();
  }

  // ============================================================
  // Public API
  // ============================================================

  setTool(tool: ToolId) {
    this.currentTool = tool;
  }

  getTool(): ToolId {
    return this.currentTool;
  }

  // ============================================================
  // Setup Event Listeners
  // ============================================================

  private setupMouseListeners() {
    this.canvas.addEventListener("mousedown", this.handleMouseDown);
    this.canvas.addEventListener("mousemove", this.handleMouseMove);
    this.canvas.addEventListener("mouseup", this.handleMouseUp);
    this.canvas.addEventListener("mouseleave", this.handleMouseLeave);
  }

  private setupKeyboardListeners() {
    // Use document for keyboard events (works when canvas isn't focused)
    this.doc.addEventListener("keydown", this.handleKeyDown);
  }

  // ============================================================
  // Mouse Handlers
  // ============================================================

  private handleMouseDown = (e: MouseEvent) => {
    if (e.button !== 0) return;
    this.pressed = true;
    this.emitSample("down", e);
  };

  private handleMouseMove = (e: MouseEvent) => {
    this.emitSample("move", e);
  };

  private handleMouseUp = (e: MouseEvent) => {
    if (e.button !== 0) return;
    this.pressed = false;
    this.emitSample("up", e);
  };

  private handleMouseLeave = (e: MouseEvent) => {
    if (!this.pressed) return;
    this.pressed = false;
    this.emitSample("up", e);
  };

  private emitSample(kind: PointerKind, e: MouseEvent) {
    const rect = this.canvas.getBoundingClientRect();
    this.bus.emit(Events.POINTER, {
      kind,
      x: e.clientX - rect.left,
      y: e.clientY - rect.top,
    });
  }

  // ============================================================
  // Keyboard Handlers
  // ============================================================

  private handleKeyDown = (e: KeyboardEvent) => {
    if (e.target instanceof HTMLInputElement) return;

    const key = e.key.toLowerCase();

    if (key === "z" && (e.metaKey || e.ctrlKey)) {
      e.preventDefault();
      this.bus.emit(e.shiftKey ? Events.REDO : Events.UNDO, null);
      return;
    }

    if (e.metaKey || e.ctrlKey || e.altKey) return;

    const tool = getToolByHotkey(key);
    if (tool && isToolId(tool.id) && tool.id !== this.currentTool) {
      this.currentTool = tool.id;
      this.bus.emit(Events.TOOL_CHANGE, this.currentTool);
    }
  };

  // ============================================================
  // Cleanup
  // ============================================================

  destroy() {
    this.canvas.removeEventListener("mousedown", this.handleMouseDown);
    this.canvas.removeEventListener("mousemove", this.handleMouseMove);
    this.canvas.removeEventListener("mouseup", this.handleMouseUp);
    this.canvas.removeEventListener("mouseleave", this.handleMouseLeave);
    this.doc.removeEventListener("keydown", this.handleKeyDown);
  }
}
