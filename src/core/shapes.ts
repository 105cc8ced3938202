/**
 * Shape Model
 *
 * Committed drawing primitives. Shapes are frozen value objects: once a
 * gesture commits one it is never edited, only moved between the history
 * stacks or dropped.
 */
import { type Color, toCssColorString } from "./color";
import type { RasterTarget } from "./types";

export interface CircleShape {
  readonly kind: "circle";
  readonly x: number;
  readonly y: number;
  readonly radius: number;
  readonly color: Color;
}

/** Corners may be given in any order */
export interface RectangleShape {
  readonly kind: "rectangle";
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
  readonly color: Color;
}

export type Shape = CircleShape | RectangleShape;

export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function circle(x: number, y: number, radius: number, color: Color): CircleShape {
  return Object.freeze({ kind: "circle", x, y, radius: Math.max(0, radius), color });
}

export function rectangle(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  color: Color
): RectangleShape {
  return Object.freeze({ kind: "rectangle", x1, y1, x2, y2, color });
}

export function normalizedBounds(rect: RectangleShape): Bounds {
  const x = Math.min(rect.x1, rect.x2);
  const y = Math.min(rect.y1, rect.y2);
  return {
    x,
    y,
    width: Math.max(rect.x1, rect.x2) - x,
    height: Math.max(rect.y1, rect.y2) - y,
  };
}

export function renderShape(shape: Shape, target: RasterTarget): void {
  const fill = toCssColorString(shape.color);

  switch (shape.kind) {
    case "circle":
      target.fillArc(shape.x, shape.y, shape.radius, 0, Math.PI * 2, fill);
      break;
    case "rectangle":
      // Signed extents; the target flips negative ones
      target.fillRect(shape.x1, shape.y1, shape.x2 - shape.x1, shape.y2 - shape.y1, fill);
      break;
  }
}
