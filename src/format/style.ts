/**
 * Style Strings
 *
 * Parses style descriptors such as `"bold white"` or `"fg:#ff8800 bg:236
 * italic"` and turns them into ANSI SGR sequences.
 *
 * ## NO_COLOR Support
 *
 * {@link shouldUseColors} follows https://no-color.org/: `NO_COLOR` (any
 * value) or `FORCE_COLOR=0` disables all escape codes. Prompt output is
 * captured by the shell rather than written to a TTY, so colors are
 * otherwise on.
 *
 * @module format/style
 */

import { env } from "node:process";
import { TemplateError } from "./errors";

export type Color =
  | { kind: "basic"; code: number }
  | { kind: "fixed"; index: number }
  | { kind: "rgb"; r: number; g: number; b: number };

export interface Style {
  fg?: Color;
  bg?: Color;
  bold?: boolean;
  dimmed?: boolean;
  italic?: boolean;
  underline?: boolean;
  blink?: boolean;
  inverted?: boolean;
  hidden?: boolean;
  strikethrough?: boolean;
}

type Modifier = Exclude<keyof Style, "fg" | "bg">;

/** SGR parameter of each modifier, in emission order */
const MODIFIERS: ReadonlyArray<[Modifier, number]> = [
  ["bold", 1],
  ["dimmed", 2],
  ["italic", 3],
  ["underline", 4],
  ["blink", 5],
  ["inverted", 7],
  ["hidden", 8],
  ["strikethrough", 9],
];

const MODIFIER_NAMES = new Set<string>(MODIFIERS.map(([name]) => name));

const BASIC_COLORS = new Map<string, number>([
  ["black", 0],
  ["red", 1],
  ["green", 2],
  ["yellow", 3],
  ["blue", 4],
  ["purple", 5],
  ["magenta", 5],
  ["cyan", 6],
  ["white", 7],
]);

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/;

export function shouldUseColors(environment: Record<string, string | undefined> = env): boolean {
  if (environment.NO_COLOR !== undefined) return false;
  return environment.FORCE_COLOR !== "0";
}

export function parseColor(value: string): Color | undefined {
  const name = value.toLowerCase();

  const basic = BASIC_COLORS.get(name);
  if (basic !== undefined) {
    return { kind: "basic", code: basic };
  }

  if (name.startsWith("bright-")) {
    const base = BASIC_COLORS.get(name.slice("bright-".length));
    return base === undefined ? undefined : { kind: "fixed", index: base + 8 };
  }

  const hex = HEX_COLOR.exec(name);
  if (hex) {
    return {
      kind: "rgb",
      r: parseInt(hex[1], 16),
      g: parseInt(hex[2], 16),
      b: parseInt(hex[3], 16),
    };
  }

  if (/^\d{1,3}$/.test(name)) {
    const index = Number(name);
    if (index <= 255) return { kind: "fixed", index };
  }

  return undefined;
}

/**
 * Parse a style descriptor. Tokens apply left to right; `none` clears
 * everything before it.
 * @throws {TemplateError} on a token that is neither a modifier nor a color
 */
export function parseStyle(descriptor: string): Style {
  let style: Style = {};

  for (const token of descriptor.split(/\s+/).filter(Boolean)) {
    const lower = token.toLowerCase();

    if (lower === "none") {
      style = {};
      continue;
    }

    if (isModifier(lower)) {
      style[lower] = true;
      continue;
    }

    if (lower.startsWith("fg:") || lower.startsWith("bg:")) {
      const target = lower.startsWith("fg:") ? "fg" : "bg";
      const value = lower.slice(3);
      if (value === "none") {
        delete style[target];
        continue;
      }
      style[target] = colorOrThrow(value, token);
      continue;
    }

    style.fg = colorOrThrow(lower, token);
  }

  return style;
}

function isModifier(token: string): token is Modifier {
  return MODIFIER_NAMES.has(token);
}

function colorOrThrow(value: string, token: string): Color {
  const color = parseColor(value);
  if (!color) {
    throw new TemplateError("INVALID_STYLE", `Invalid style token '${token}'`);
  }
  return color;
}

function colorParams(color: Color, base: 30 | 40): string {
  switch (color.kind) {
    case "basic":
      return String(base + color.code);
    case "fixed":
      return `${base + 8};5;${color.index}`;
    case "rgb":
      return `${base + 8};2;${color.r};${color.g};${color.b}`;
  }
}

/**
 * The SGR opening sequence of a style, or "" when the style is empty
 */
export function stylePrefix(style: Style | undefined): string {
  if (!style) return "";

  const params: string[] = [];
  for (const [modifier, code] of MODIFIERS) {
    if (style[modifier]) params.push(String(code));
  }
  if (style.bg) params.push(colorParams(style.bg, 40));
  if (style.fg) params.push(colorParams(style.fg, 30));

  return params.length > 0 ? `\x1b[${params.join(";")}m` : "";
}

export const RESET = "\x1b[0m";
