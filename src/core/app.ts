/**
 * Main Application Orchestrator
 *
 * Central coordinator that:
 * - Finds the main and preview canvases and wraps them as surfaces
 * - Creates the PaintCanvas controller and the pointer input source
 * - Routes bus events (input) and toolbar events (UI) to the controller
 * - Keeps the UI stores in sync with controller state
 */
import { PaintCanvas } from "./paint-canvas";
import { CanvasSurface } from "./canvas-surface";
import { DownloadLinkSink } from "./download-sink";
import { PointerInput } from "./pointer-input";
import { bus, Events } from "./event-bus";
import { type PaintConfig, resolveConfig } from "./config";
import { toHex } from "./color";
import { logger } from "./logger";
import type { ToolId } from "./tools";
import { bindToolbarEvents } from "./toolbar-events";
import type { PointerSample } from "./types";
import type { PaintToolbar } from "../ui/ui-lib";
import "../ui/ui-lib"; // Register Lit components
import { colorStore, secondaryColorStore, toolStore } from "./stores";

export class App {
  private mainCanvas: HTMLCanvasElement;
  private previewCanvas: HTMLCanvasElement;
  private mainSurface: CanvasSurface;
  private previewSurface: CanvasSurface;
  private toolbar: PaintToolbar;
  private config: PaintConfig;
  private paintCanvas: PaintCanvas;
  private input: PointerInput;
  private sink = new DownloadLinkSink();
  private unsubscribers: Array<() => void> = [];

  constructor(overrides: Partial<PaintConfig> = {}) {
    const mainCanvas = document.getElementById("paint-canvas");
    const previewCanvas = document.getElementById("preview-canvas");
    const toolbar = document.querySelector("paint-toolbar");

    if (!(mainCanvas instanceof HTMLCanvasElement) || !(previewCanvas instanceof HTMLCanvasElement)) {
      throw new Error("Canvas elements not found");
    }
    if (!toolbar) {
      throw new Error("Toolbar element not found");
    }

    const mainCtx = mainCanvas.getContext("2d");
    const previewCtx = previewCanvas.getContext("2d");

    if (!mainCtx || !previewCtx) {
      throw new Error("Could not get 2D contexts");
    }

    this.mainCanvas = mainCanvas;
    this.previewCanvas = previewCanvas;
    this.toolbar = toolbar;
    this.mainSurface = new CanvasSurface(mainCtx);
    this.previewSurface = new CanvasSurface(previewCtx);

    this.config = resolveConfig(overrides);
    this.paintCanvas = new PaintCanvas(this.config);

    // The preview canvas sits on top, so it receives the mouse
    this.input = new PointerInput(this.previewCanvas);
  }

  init() {
    colorStore.set(toHex(this.paintCanvas.primaryColor()));
    secondaryColorStore.set(toHex(this.paintCanvas.secondaryColor()));
    toolStore.set(this.paintCanvas.activeToolId());

    this.mainSurface.resize(this.config);
    this.previewSurface.resize(this.config);
    this.paintCanvas.attachSurfaces({ main: this.mainSurface, preview: this.previewSurface });

    this.subscribeToInputEvents();
    this.setupToolbarEvents();

    logger.log(`App initialized with a ${this.config.width}x${this.config.height} canvas`);
  }

  private subscribeToInputEvents() {
    this.unsubscribers.push(
      bus.on(Events.POINTER, (sample: PointerSample) => this.paintCanvas.handlePointer(sample)),
      bus.on(Events.TOOL_CHANGE, (tool: ToolId) => this.onToolChange(tool)),
      bus.on(Events.PRIMARY_COLOR_CHANGE, (hex: string) => this.onColorChange(hex)),
      bus.on(Events.SECONDARY_COLOR_CHANGE, (hex: string) => this.onSecondaryColorChange(hex)),
      bus.on(Events.UNDO, () => this.paintCanvas.undo()),
      bus.on(Events.REDO, () => this.paintCanvas.redo()),
      bus.on(Events.CLEAR, () => this.paintCanvas.clear()),
      bus.on(Events.SAVE, () => this.onSave())
    );
  }

  private setupToolbarEvents() {
    this.unsubscribers.push(bindToolbarEvents(this.toolbar, bus));
  }

  private onToolChange(tool: ToolId) {
    this.paintCanvas.selectTool(tool);
    this.input.setTool(tool);
    toolStore.set(tool);
  }

  private onColorChange(hex: string) {
    if (this.paintCanvas.changePrimaryColor(hex)) {
      colorStore.set(toHex(this.paintCanvas.primaryColor()));
    }
  }

  private onSecondaryColorChange(hex: string) {
    if (this.paintCanvas.changeSecondaryColor(hex)) {
      secondaryColorStore.set(toHex(this.paintCanvas.secondaryColor()));
    }
  }

  private onSave() {
    if (this.paintCanvas.save(this.sink)) {
      logger.log(`Image exported as ${this.config.exportFileName}`);
    }
  }

  destroy() {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
    this.input.destroy();
    this.paintCanvas.detachSurfaces();
    logger.log(`Detached from #${this.mainCanvas.id}`);
  }
}
