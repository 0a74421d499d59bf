/**
 * String Formatter
 *
 * Evaluates a parsed format string against three kinds of variable
 * resolvers and produces styled segments.
 *
 * - meta variables resolve to a format string of their own, which is parsed
 *   and expanded in place (`$symbol`)
 * - style variables resolve inside the `(style)` part of a text group and
 *   are always present (`$style`)
 * - plain variables resolve to an optional string
 *
 * An absent variable renders nothing, and a `(conditional)` group renders
 * only when some variable inside it has a non-empty value.
 *
 * @module format/formatter
 */

import { TemplateError } from "./errors";
import { parseFormat, type FormatElement, type StyleElement } from "./parser";
import { parseStyle, type Style } from "./style";

export type MetaResolver = () => string | undefined;
export type StyleResolver = () => string;
export type VariableResolver = () => string | undefined;

export interface Segment {
  text: string;
  style?: Style;
}

export class StringFormatter {
  private readonly metaResolvers = new Map<string, MetaResolver>();
  private readonly styleResolvers = new Map<string, StyleResolver>();
  private readonly variableResolvers = new Map<string, VariableResolver>();
  private readonly values = new Map<string, string | undefined>();

  private constructor(private readonly elements: FormatElement[]) {}

  /**
   * @throws {TemplateError} when the format string is malformed
   */
  static parse(format: string): StringFormatter {
    return new StringFormatter(parseFormat(format));
  }

  mapMeta(resolvers: Record<string, MetaResolver>): this {
    for (const [name, resolver] of Object.entries(resolvers)) {
      this.metaResolvers.set(name, resolver);
    }
    return this;
  }

  mapStyle(resolvers: Record<string, StyleResolver>): this {
    for (const [name, resolver] of Object.entries(resolvers)) {
      this.styleResolvers.set(name, resolver);
    }
    return this;
  }

  map(resolvers: Record<string, VariableResolver>): this {
    for (const [name, resolver] of Object.entries(resolvers)) {
      this.variableResolvers.set(name, resolver);
    }
    return this;
  }

  /**
   * Evaluate the format. Each resolver runs at most once.
   * @throws {TemplateError} for unknown variables, invalid styles and
   * malformed meta values
   */
  format(): Segment[] {
    this.checkVariables(this.elements, true);
    return this.evaluate(this.elements, undefined, true);
  }

  private checkVariables(elements: readonly FormatElement[], allowMeta: boolean): void {
    for (const element of elements) {
      switch (element.kind) {
        case "variable":
          if (!this.isTextVariable(element.name, allowMeta)) {
            throw unknownVariable(element.name);
          }
          break;
        case "textGroup":
          this.checkVariables(element.format, allowMeta);
          for (const part of element.style) {
            if (part.kind === "variable" && !this.styleResolvers.has(part.name)) {
              throw unknownVariable(part.name);
            }
          }
          break;
        case "conditional":
          this.checkVariables(element.format, allowMeta);
          break;
      }
    }
  }

  private isTextVariable(name: string, allowMeta: boolean): boolean {
    return this.variableResolvers.has(name) || (allowMeta && this.metaResolvers.has(name));
  }

  private evaluate(elements: readonly FormatElement[], style: Style | undefined, allowMeta: boolean): Segment[] {
    const segments: Segment[] = [];

    for (const element of elements) {
      switch (element.kind) {
        case "text":
          segments.push({ text: element.value, style });
          break;

        case "variable": {
          if (allowMeta && this.metaResolvers.has(element.name)) {
            const value = this.value(element.name);
            if (value) {
              // meta values expand once; they cannot refer to other meta variables
              const nested = parseFormat(value);
              this.checkVariables(nested, false);
              segments.push(...this.evaluate(nested, style, false));
            }
          } else {
            const value = this.value(element.name);
            if (value) segments.push({ text: value, style });
          }
          break;
        }

        case "textGroup":
          segments.push(...this.evaluate(element.format, parseStyle(this.styleString(element.style)), allowMeta));
          break;

        case "conditional":
          if (this.hasValue(element.format)) {
            segments.push(...this.evaluate(element.format, style, allowMeta));
          }
          break;
      }
    }

    return segments;
  }

  private hasValue(elements: readonly FormatElement[]): boolean {
    return elements.some((element) => {
      switch (element.kind) {
        case "variable":
          return Boolean(this.value(element.name));
        case "textGroup":
        case "conditional":
          return this.hasValue(element.format);
        case "text":
          return false;
      }
    });
  }

  private styleString(parts: readonly StyleElement[]): string {
    return parts
      .map((part) => (part.kind === "text" ? part.value : this.styleValue(part.name)))
      .join("");
  }

  private styleValue(name: string): string {
    const resolver = this.styleResolvers.get(name);
    if (!resolver) throw unknownVariable(name);
    return resolver();
  }

  private value(name: string): string | undefined {
    if (this.values.has(name)) return this.values.get(name);

    const resolver = this.variableResolvers.get(name) ?? this.metaResolvers.get(name);
    if (!resolver) throw unknownVariable(name);

    const value = resolver();
    this.values.set(name, value);
    return value;
  }
}

function unknownVariable(name: string): TemplateError {
  return new TemplateError("UNKNOWN_VARIABLE", `Unknown variable '$${name}'`);
}
