/**
 * Paint Configuration
 *
 * Canvas dimensions, brush size, default colors and the export file name.
 * Dimensions are fixed once a controller is constructed.
 */
import { type Color, BLUE, WHITE } from "./color";

export interface PaintConfig {
  width: number;
  height: number;
  brushRadius: number;
  background: Color;
  primaryColor: Color;
  secondaryColor: Color;
  exportFileName: string;
}

export const DEFAULT_CONFIG: Readonly<PaintConfig> = Object.freeze({
  width: 500,
  height: 500,
  brushRadius: 5,
  background: WHITE,
  primaryColor: BLUE,
  secondaryColor: WHITE,
  exportFileName: "canvas.png",
});

/**
 * Merge overrides onto the defaults.
 * @throws Error when a dimension or the brush radius is not a positive number
 */
export function resolveConfig(overrides: Partial<PaintConfig> = {}): PaintConfig {
  const config: PaintConfig = { ...DEFAULT_CONFIG, ...overrides };

  for (const key of ["width", "height", "brushRadius"] as const) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid paint config: ${key} must be a positive number, got ${value}`);
    }
  }
  if (config.exportFileName.trim() === "") {
    throw new Error("Invalid paint config: exportFileName must not be empty");
  }

  return config;
}
