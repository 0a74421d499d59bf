/**
 * Segment rendering.
 *
 * @module format/render
 */

import type { Segment } from "./formatter";
import { RESET, stylePrefix } from "./style";

export interface RenderOptions {
  /** Emit ANSI escape codes */
  colors: boolean;
}

/**
 * Join segments into one string. Adjacent segments with the same style are
 * painted as a single run.
 */
export function renderSegments(segments: readonly Segment[], options: RenderOptions): string {
  let output = "";
  let runPrefix = "";
  let runText = "";

  const flush = () => {
    if (!runText) return;
    output += runPrefix ? `${runPrefix}${runText}${RESET}` : runText;
    runText = "";
  };

  for (const segment of segments) {
    if (!segment.text) continue;
    const prefix = options.colors ? stylePrefix(segment.style) : "";
    if (prefix !== runPrefix) {
      flush();
      runPrefix = prefix;
    }
    runText += segment.text;
  }

  flush();
  return output;
}
