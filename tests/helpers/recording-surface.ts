import type { EncodableSurface } from "../../src/core/types";

export type DrawOp =
  | { op: "clearRect"; x: number; y: number; w: number; h: number }
  | { op: "fillRect"; x: number; y: number; w: number; h: number; color: string }
  | { op: "fillArc"; cx: number; cy: number; r: number; start: number; end: number; color: string };

/**
 * In-memory raster target that records every primitive call
 */
export class RecordingSurface implements EncodableSurface {
  ops: DrawOp[] = [];
  dataUrl = "data:image/png;base64,AAAA";

  clearRect(x: number, y: number, w: number, h: number) {
    this.ops.push({ op: "clearRect", x, y, w, h });
  }

  fillRect(x: number, y: number, w: number, h: number, color: string) {
    this.ops.push({ op: "fillRect", x, y, w, h, color });
  }

  fillArc(cx: number, cy: number, r: number, start: number, end: number, color: string) {
    this.ops.push({ op: "fillArc", cx, cy, r, start, end, color });
  }

  toDataUrl(): string {
    return this.dataUrl;
  }

  reset() {
    this.ops = [];
  }
}
