/**
 * Format String Parser
 *
 * Grammar:
 *
 * ```
 * format      = element*
 * element     = text | variable | textGroup | conditional
 * variable    = "$" name | "${" name "}"          name = [A-Za-z0-9_]+
 * textGroup   = "[" format "]" "(" style ")"
 * conditional = "(" format ")"
 * style       = (styleText | variable)*
 * ```
 *
 * `\` escapes any of `[ ] ( ) $ \` in text and style strings.
 *
 * @module format/parser
 */

import { TemplateError } from "./errors";

export type StyleElement =
  | { kind: "text"; value: string }
  | { kind: "variable"; name: string };

export type FormatElement =
  | { kind: "text"; value: string }
  | { kind: "variable"; name: string }
  | { kind: "textGroup"; format: FormatElement[]; style: StyleElement[] }
  | { kind: "conditional"; format: FormatElement[] };

const ESCAPABLE = new Set(["[", "]", "(", ")", "$", "\\"]);
const NAME_CHAR = /[A-Za-z0-9_]/;

/**
 * Parse a format string into its element tree.
 * @throws {TemplateError} when the string is malformed
 */
export function parseFormat(format: string): FormatElement[] {
  return new Parser(format).parseElements(null, 0);
}

class Parser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parseElements(closer: "]" | ")" | null, openedAt: number): FormatElement[] {
    const elements: FormatElement[] = [];
    let text = "";

    const flush = () => {
      if (text) {
        elements.push({ kind: "text", value: text });
        text = "";
      }
    };

    while (this.pos < this.input.length) {
      const char = this.input[this.pos];

      if (char === closer) {
        flush();
        return elements;
      }

      switch (char) {
        case "\\":
          text += this.readEscape();
          break;
        case "$":
          flush();
          elements.push({ kind: "variable", name: this.readVariable() });
          break;
        case "[":
          flush();
          elements.push(this.readTextGroup());
          break;
        case "(":
          flush();
          elements.push(this.readConditional());
          break;
        case "]":
        case ")":
          throw new TemplateError("UNEXPECTED_TOKEN", `Unexpected '${char}'`, this.pos + 1);
        default:
          text += char;
          this.pos++;
      }
    }

    if (closer !== null) {
      throw new TemplateError("UNCLOSED_GROUP", `Unclosed '${this.input[openedAt]}'`, openedAt + 1);
    }

    flush();
    return elements;
  }

  private readEscape(): string {
    const start = this.pos;
    const next = this.input[start + 1];
    if (next === undefined || !ESCAPABLE.has(next)) {
      throw new TemplateError(
        "DANGLING_ESCAPE",
        "Backslash must escape one of [ ] ( ) $ \\",
        start + 1
      );
    }
    this.pos += 2;
    return next;
  }

  private readVariable(): string {
    const start = this.pos;
    this.pos++;

    const braced = this.input[this.pos] === "{";
    if (braced) this.pos++;

    let name = "";
    while (this.pos < this.input.length && NAME_CHAR.test(this.input[this.pos])) {
      name += this.input[this.pos];
      this.pos++;
    }

    if (!name) {
      throw new TemplateError("EMPTY_VARIABLE", "Expected a variable name after '$'", start + 1);
    }

    if (braced) {
      if (this.input[this.pos] !== "}") {
        throw new TemplateError("UNCLOSED_GROUP", "Unclosed '${'", start + 1);
      }
      this.pos++;
    }

    return name;
  }

  private readTextGroup(): FormatElement {
    const open = this.pos;
    this.pos++;
    const format = this.parseElements("]", open);
    this.pos++;

    if (this.input[this.pos] !== "(") {
      throw new TemplateError("MISSING_STYLE", "Text group must be followed by a (style)", this.pos + 1);
    }

    const style = this.readStyle();
    return { kind: "textGroup", format, style };
  }

  private readStyle(): StyleElement[] {
    const open = this.pos;
    this.pos++;

    const elements: StyleElement[] = [];
    let text = "";

    while (this.pos < this.input.length) {
      const char = this.input[this.pos];

      if (char === ")") {
        if (text) elements.push({ kind: "text", value: text });
        this.pos++;
        return elements;
      }

      switch (char) {
        case "\\":
          text += this.readEscape();
          break;
        case "$":
          if (text) elements.push({ kind: "text", value: text });
          text = "";
          elements.push({ kind: "variable", name: this.readVariable() });
          break;
        case "[":
        case "]":
        case "(":
          throw new TemplateError("UNEXPECTED_TOKEN", `Unexpected '${char}' in style`, this.pos + 1);
        default:
          text += char;
          this.pos++;
      }
    }

    throw new TemplateError("UNCLOSED_GROUP", "Unclosed '('", open + 1);
  }

  private readConditional(): FormatElement {
    const open = this.pos;
    this.pos++;
    const format = this.parseElements(")", open);
    this.pos++;
    return { kind: "conditional", format };
  }
}

