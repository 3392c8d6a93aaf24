import { describe, it, expect } from "vitest";
import { splitMessage, MAX_MESSAGE_LENGTH } from "./utils.js";

describe("splitMessage", () => {
  it("should return text that fits as a single chunk", () => {
    expect(splitMessage("Short answer.")).toEqual(["Short answer."]);
  });

  it("should return an empty array for whitespace-only text", () => {
    expect(splitMessage("   ", 2)).toEqual([]);
  });

  it("should keep text of exactly the limit whole", () => {
    const text = "a".repeat(MAX_MESSAGE_LENGTH);
    expect(splitMessage(text)).toEqual([text]);
  });

  it("should prefer a blank line over a newline or space", () => {
    expect(splitMessage("one two\n\nthree four", 14)).toEqual(["one two", "three four"]);
  });

  it("should fall back to the last newline", () => {
    expect(splitMessage("alpha beta\ngamma delta", 15)).toEqual(["alpha beta", "gamma delta"]);
  });

  it("should fall back to the last space", () => {
    expect(splitMessage("alpha beta gamma", 12)).toEqual(["alpha beta", "gamma"]);
  });

  it("should cut hard when no break exists inside the window", () => {
    expect(splitMessage("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("should not split an emoji across a hard cut", () => {
    const text = "a" + "😀".repeat(3000);
    const chunks = splitMessage(text);

    expect(chunks.map((c) => c.length)).toEqual([4095, 1906]);
    expect(chunks.join("")).toBe(text);
    expect(chunks[0].endsWith("😀")).toBe(true);
  });

  it("should keep a surrogate pair whole at a small limit", () => {
    expect(splitMessage("a😀😀", 2)).toEqual(["a", "😀", "😀"]);
  });

  it("should keep HTML markup inside a chunk", () => {
    const text = "1. <b>First point</b>\n2. <b>Second point</b>";
    expect(splitMessage(text, 25)).toEqual(["1. <b>First point</b>", "2. <b>Second point</b>"]);
  });

  it("should reject a non-positive limit", () => {
    expect(() => splitMessage("text", 0)).toThrow(RangeError);
  });
});
