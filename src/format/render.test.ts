import { describe, it, expect } from "vitest";
import { renderSegments } from "./render";
import { parseStyle } from "./style";

describe("renderSegments", () => {
  const bold = parseStyle("bold white");
  const red = parseStyle("red");

  it("should paint adjacent segments with the same style as one run", () => {
    const output = renderSegments(
      [
        { text: "❓ ", style: bold },
        { text: "Unknown", style: parseStyle("white bold") },
        { text: " ", style: bold },
      ],
      { colors: true }
    );
    expect(output).toBe("\x1b[1;37m❓ Unknown \x1b[0m");
  });

  it("should start a new run when the style changes", () => {
    const output = renderSegments(
      [
        { text: "a", style: red },
        { text: "b" },
        { text: "c", style: red },
      ],
      { colors: true }
    );
    expect(output).toBe("\x1b[31ma\x1b[0mb\x1b[31mc\x1b[0m");
  });

  it("should skip empty segments", () => {
    expect(renderSegments([{ text: "", style: red }], { colors: true })).toBe("");
  });

  it("should write plain text when colors are off", () => {
    expect(renderSegments([{ text: "a", style: red }, { text: "b", style: bold }], { colors: false })).toBe("ab");
  });
});
