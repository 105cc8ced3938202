/**
 * Type Definitions
 *
 * Shared TypeScript interfaces used across all modules:
 * - Point: canvas-local x, y coordinates
 * - PointerKind / PointerSample: one sample from the pointer event source
 * - RasterTarget: the drawing primitives shapes render through
 * - EncodableSurface: a raster target whose pixels can be exported
 * - ExportSink: receives encoded image data for download
 */
export interface Point {
  x: number;
  y: number;
}

export type PointerKind = "down" | "move" | "up";

export interface PointerSample extends Point {
  kind: PointerKind;
}

/**
 * Minimal raster API. Negative width/height on fillRect extend the box
 * in the opposite direction, as CanvasRenderingContext2D does.
 */
export interface RasterTarget {
  clearRect(x: number, y: number, w: number, h: number): void;
  fillRect(x: number, y: number, w: number, h: number, cssColor: string): void;
  fillArc(
    cx: number,
    cy: number,
    r: number,
    startAngle: number,
    endAngle: number,
    cssColor: string
  ): void;
}

export interface EncodableSurface extends RasterTarget {
  toDataUrl(): string;
}

export interface ExportSink {
  exportImage(dataUrl: string, fileName: string): void;
}

export interface CanvasSize {
  width: number;
  height: number;
}
