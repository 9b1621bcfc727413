import type { Style } from "../types.js";
import { SelectorParseError } from "./errors.js";

const ESC = "\x1b";

/** Restores the default foreground color. */
export const ANSI_RESET = `${ESC}[39m`;

const BASIC_COLORS: Record<string, number> = {
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
};

export const COLOR_NAMES: string[] = [
  "default",
  ...Object.keys(BASIC_COLORS),
  ...Object.keys(BASIC_COLORS).map((name) => `bright-${name}`),
  "fixed(N)",
  "rgb(R,G,B)",
  "size",
  "marker",
];

export const MARKER_STYLE: Style = { kind: "marker" };
export const SIZE_STYLE: Style = { kind: "size" };

function ansi(name: string, code: string): Style {
  return { kind: "ansi", name, open: `${ESC}[${code}m` };
}

function parseChannel(value: string, token: string): number {
  if (!/^\d{1,3}$/.test(value)) {
    throw new SelectorParseError(`invalid color number in '${token}'`, token);
  }
  const num = parseInt(value, 10);
  if (num > 255) {
    throw new SelectorParseError(
      `color number out of range (0-255) in '${token}'`,
      token,
    );
  }
  return num;
}

function lookupBasic(name: string): number | undefined {
  return Object.hasOwn(BASIC_COLORS, name) ? BASIC_COLORS[name] : undefined;
}

/**
 * Parse a style token from a selector.
 *
 * @example
 * parseStyle("red")          // { kind: "ansi", name: "red", open: "\x1b[31m" }
 * parseStyle("fixed(208)")   // open: "\x1b[38;5;208m"
 * parseStyle("rgb(255,0,0)") // open: "\x1b[38;2;255;0;0m"
 */
export function parseStyle(token: string): Style {
  if (token === "marker") return MARKER_STYLE;
  if (token === "size") return SIZE_STYLE;
  if (token === "default") return ansi(token, "39");

  const basic = lookupBasic(token);
  if (basic !== undefined) {
    return ansi(token, `3${basic}`);
  }

  if (token.startsWith("bright-")) {
    const bright = lookupBasic(token.slice("bright-".length));
    if (bright !== undefined) {
      return ansi(token, `9${bright}`);
    }
  }

  const fixed = /^fixed\((.*)\)$/.exec(token);
  if (fixed) {
    return ansi(token, `38;5;${parseChannel(fixed[1], token)}`);
  }

  const rgb = /^rgb\((.*)\)$/.exec(token);
  if (rgb) {
    const parts = rgb[1].split(",");
    if (parts.length !== 3) {
      throw new SelectorParseError(
        `rgb color needs three components in '${token}'`,
        token,
      );
    }
    const [r, g, b] = parts.map((part) => parseChannel(part.trim(), token));
    return ansi(token, `38;2;${r};${g};${b}`);
  }

  throw new SelectorParseError(`unknown color '${token}'`, token);
}
