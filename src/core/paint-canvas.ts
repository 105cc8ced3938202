/**
 * Paint Canvas - Drawing Controller
 *
 * Owns the committed shape history, the active tool and the two render
 * surfaces:
 * - main: committed shapes over an opaque background, repainted in full
 *   after every input event
 * - preview: transient feedback (e.g. a rectangle being dragged), only
 *   touched by the active tool's hooks
 *
 * Gesture state is the `pointerDown` flag plus the active tool's own state.
 * Surfaces may be attached late; until then repaints are skipped and
 * state changes still apply.
 */
import { type Color, describeColorError, parseHex, toCssColorString } from "./color";
import type { PaintConfig } from "./config";
import { ShapeHistory } from "./history";
import { logger } from "./logger";
import { type Shape, renderShape } from "./shapes";
import {
  type Tool,
  type ToolContext,
  type ToolId,
  cancelGesture,
  createTool,
  endGesture,
  moveGesture,
  setPrimaryColor,
  setSecondaryColor,
  startGesture,
} from "./tools";
import type { EncodableSurface, ExportSink, PointerSample, RasterTarget } from "./types";

export interface Surfaces {
  main: EncodableSurface;
  preview: RasterTarget;
}

export class PaintCanvas {
  private config: PaintConfig;
  private history: ShapeHistory;
  private tool: Tool;
  private primary: Color;
  private secondary: Color;
  private pointerDown = false;

  private main: EncodableSurface | null = null;
  private preview: RasterTarget | null = null;

  // Tool context shared with tool behavior hooks
  private toolContext: ToolContext;

  constructor(config: PaintConfig, history: ShapeHistory = new ShapeHistory()) {
    this.config = config;
    this.history = history;
    this.primary = config.primaryColor;
    this.secondary = config.secondaryColor;
    this.tool = createTool("brush", this.primary, { brushRadius: config.brushRadius });

    this.toolContext = {
      commit: (shape) => this.history.push(shape),
      showPreview: (shape) => this.showPreview(shape),
      clearPreview: () => this.clearPreview(),
    };
  }

  // ============================================================
  // Surfaces
  // ============================================================

  attachSurfaces(surfaces: Surfaces) {
    this.main = surfaces.main;
    this.preview = surfaces.preview;
    this.clearPreview();
    this.repaint();
  }

  detachSurfaces() {
    this.main = null;
    this.preview = null;
  }

  // ============================================================
  // Input Events
  // ============================================================

  /**
   * Feed one pointer sample through the gesture state machine.
   * Moves and ups outside a gesture are ignored.
   */
  handlePointer(sample: PointerSample) {
    const point = { x: sample.x, y: sample.y };

    switch (sample.kind) {
      case "down":
        // A down without the matching up restarts the gesture
        if (this.pointerDown) cancelGesture(this.tool, this.toolContext);
        this.pointerDown = true;
        startGesture(this.tool, this.toolContext, point);
        break;
      case "move":
        if (!this.pointerDown) return;
        moveGesture(this.tool, this.toolContext, point);
        break;
      case "up":
        if (!this.pointerDown) return;
        this.pointerDown = false;
        endGesture(this.tool, this.toolContext, point);
        break;
    }

    this.repaint();
  }

  /**
   * Replace the active tool. An in-progress gesture is abandoned, not
   * committed, and the new tool starts with the current primary color.
   */
  selectTool(id: ToolId) {
    cancelGesture(this.tool, this.toolContext);
    this.pointerDown = false;
    this.tool = createTool(id, this.primary, { brushRadius: this.config.brushRadius });
    setSecondaryColor(this.tool, this.secondary);
    this.repaint();
  }

  /**
   * @returns false when the hex string is rejected; the old color stays
   */
  changePrimaryColor(hex: string): boolean {
    const color = this.parseColor(hex);
    if (!color) return false;

    this.primary = color;
    setPrimaryColor(this.tool, color);
    this.repaint();
    return true;
  }

  /**
   * @returns false when the hex string is rejected; the old color stays
   */
  changeSecondaryColor(hex: string): boolean {
    const color = this.parseColor(hex);
    if (!color) return false;

    this.secondary = color;
    setSecondaryColor(this.tool, color);
    this.repaint();
    return true;
  }

  undo() {
    this.history.undo();
    this.repaint();
  }

  redo() {
    this.history.redo();
    this.repaint();
  }

  clear() {
    this.history.clear();
    this.repaint();
  }

  /**
   * Hand the main surface's encoded pixels to the sink. No drawing state
   * changes.
   * @returns false when no main surface is attached
   */
  save(sink: ExportSink): boolean {
    if (!this.main) {
      logger.warn("Main surface is not attached; nothing to save");
      return false;
    }
    sink.exportImage(this.main.toDataUrl(), this.config.exportFileName);
    return true;
  }

  // ============================================================
  // Accessors
  // ============================================================

  activeToolId(): ToolId {
    return this.tool.id;
  }

  primaryColor(): Color {
    return this.primary;
  }

  secondaryColor(): Color {
    return this.secondary;
  }

  isPointerDown(): boolean {
    return this.pointerDown;
  }

  shapes(): readonly Shape[] {
    return this.history.committedShapes();
  }

  // ============================================================
  // Rendering
  // ============================================================

  /**
   * Painter's algorithm: background, then every committed shape in order
   */
  private repaint() {
    if (!this.main) {
      logger.warn("Main surface is not attached; skipping repaint");
      return;
    }

    const { width, height, background } = this.config;
    this.main.clearRect(0, 0, width, height);
    this.main.fillRect(0, 0, width, height, toCssColorString(background));

    for (const shape of this.history.committedShapes()) {
      renderShape(shape, this.main);
    }
  }

  private showPreview(shape: Shape) {
    if (!this.preview) {
      logger.warn("Preview surface is not attached; skipping preview");
      return;
    }
    this.preview.clearRect(0, 0, this.config.width, this.config.height);
    renderShape(shape, this.preview);
  }

  private clearPreview() {
    this.preview?.clearRect(0, 0, this.config.width, this.config.height);
  }

  private parseColor(hex: string): Color | null {
    const result = parseHex(hex);
    if (!result.ok) {
      logger.warn("Ignoring color change:", describeColorError(result.error));
      return null;
    }
    return result.value;
  }
}
