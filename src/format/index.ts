/**
 * Format strings: parsing, evaluation, styles and rendering.
 *
 * @module format
 */

export { TemplateError, type TemplateErrorCode } from "./errors";
export { parseFormat, type FormatElement, type StyleElement } from "./parser";
export {
  StringFormatter,
  type Segment,
  type MetaResolver,
  type StyleResolver,
  type VariableResolver,
} from "./formatter";
export {
  parseStyle,
  parseColor,
  stylePrefix,
  shouldUseColors,
  RESET,
  type Style,
  type Color,
} from "./style";
export { renderSegments, type RenderOptions } from "./render";
