import { slugify } from "./slugify";

describe("slugify", () => {
  it("lowercases and dashes non-alphanumerics", () => {
    expect(slugify("Hello, World!")).toBe("hello-world");
    expect(slugify("  Node 20.11 -- Release Notes  ")).toBe("node-20-11-release-notes");
  });

  it("strips diacritics", () => {
    expect(slugify("Café Crème")).toBe("cafe-creme");
  });

  it("returns an empty string when nothing survives", () => {
    expect(slugify("日本語")).toBe("");
  });

  it("truncates without leaving a trailing dash", () => {
    expect(slugify("abcd efgh", 5)).toBe("abcd");
    expect(slugify("a".repeat(100))).toHaveLength(80);
  });
});
