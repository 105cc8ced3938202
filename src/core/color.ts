/**
 * Color
 *
 * Immutable RGB(A) values plus hex parsing and CSS serialization.
 * Parsing never throws: callers get a tagged result and decide what to do
 * with a bad value.
 */

export interface Color {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
  /** Normalized 0..1 when present */
  readonly alpha?: number;
}

export type ColorChannel = "red" | "green" | "blue" | "alpha";

export type ColorParseError =
  | { kind: "InvalidFormat"; input: string }
  | { kind: "InvalidComponent"; input: string; channel: ColorChannel };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

const CHANNELS: readonly ColorChannel[] = ["red", "green", "blue", "alpha"];
const HEX_PAIR = /^[0-9a-f]{2}$/i;

function clampByte(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Build a frozen color. Channels are rounded and clamped to 0..255,
 * alpha to 0..1.
 */
export function rgb(red: number, green: number, blue: number, alpha?: number): Color {
  const color: Color =
    alpha === undefined
      ? { red: clampByte(red), green: clampByte(green), blue: clampByte(blue) }
      : { red: clampByte(red), green: clampByte(green), blue: clampByte(blue), alpha: clampUnit(alpha) };
  return Object.freeze(color);
}

export function parseHex(input: string): Result<Color, ColorParseError> {
  const hex = input.startsWith("#") ? input.slice(1) : input;

  if (hex.length !== 6 && hex.length !== 8) {
    return { ok: false, error: { kind: "InvalidFormat", input } };
  }

  const bytes: number[] = [];
  for (let i = 0; i < hex.length; i += 2) {
    const pair = hex.slice(i, i + 2);
    if (!HEX_PAIR.test(pair)) {
      return {
        ok: false,
        error: { kind: "InvalidComponent", input, channel: CHANNELS[i / 2] },
      };
    }
    bytes.push(parseInt(pair, 16));
  }

  const [r, g, b] = bytes;
  const alpha = bytes.length === 4 ? bytes[3] / 255 : undefined;
  return { ok: true, value: rgb(r, g, b, alpha) };
}

export function toCssColorString(color: Color): string {
  const { red, green, blue, alpha } = color;
  return alpha === undefined
    ? `rgb(${red}, ${green}, ${blue})`
    : `rgba(${red}, ${green}, ${blue}, ${alpha})`;
}

/**
 * Lowercase `#rrggbb` or `#rrggbbaa`, the inverse of parseHex.
 */
export function toHex(color: Color): string {
  const bytes = [color.red, color.green, color.blue];
  if (color.alpha !== undefined) bytes.push(Math.round(color.alpha * 255));
  return (
    "#" +
    bytes
      .map((x) => {
        const hex = x.toString(16);
        return hex.length === 1 ? "0" + hex : hex;
      })
      .join("")
  );
}

export function describeColorError(error: ColorParseError): string {
  switch (error.kind) {
    case "InvalidFormat":
      return `"${error.input}" is not a 6 or 8 digit hex color`;
    case "InvalidComponent":
      return `"${error.input}" has an invalid ${error.channel} component`;
  }
}

export const WHITE: Color = rgb(255, 255, 255);
export const BLUE: Color = rgb(0, 0, 255);
