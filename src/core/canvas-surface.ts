/**
 * Canvas Surface
 *
 * Adapts a CanvasRenderingContext2D to the RasterTarget primitives shapes
 * render through. The main surface also encodes its pixels for export.
 */
import type { CanvasSize, EncodableSurface } from "./types";

export class CanvasSurface implements EncodableSurface {
  private ctx: CanvasRenderingContext2D;

  constructor(ctx: CanvasRenderingContext2D) {
    this.ctx = ctx;
  }

  /**
   * Set the backing store size. Resizing resets context state, which is
   * fine since every primitive sets its own fill style.
   */
  resize(size: CanvasSize) {
    this.ctx.canvas.width = size.width;
    this.ctx.canvas.height = size.height;
  }

  clearRect(x: number, y: number, w: number, h: number) {
    this.ctx.clearRect(x, y, w, h);
  }

  fillRect(x: number, y: number, w: number, h: number, cssColor: string) {
    this.ctx.fillStyle = cssColor;
    this.ctx.fillRect(x, y, w, h);
  }

  fillArc(cx: number, cy: number, r: number, startAngle: number, endAngle: number, cssColor: string) {
    this.ctx.fillStyle = cssColor;
    this.ctx.beginPath();
    this.ctx.arc(cx, cy, r, startAngle, endAngle);
    this.ctx.fill();
  }

  toDataUrl(): string {
    return this.ctx.canvas.toDataURL("image/png");
  }
}
