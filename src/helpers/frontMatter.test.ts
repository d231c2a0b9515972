import { parseFrontMatter, renderFrontMatter } from "./frontMatter";

describe("frontMatter", () => {
  it("renders a YAML header followed by the body", () => {
    expect(renderFrontMatter({ id: "abc", read: false }, "\nhello\n")).toBe(
      "---\nid: abc\nread: false\n---\n\nhello\n"
    );
  });

  it("parses what it renders", () => {
    const text = renderFrontMatter(
      { guid: "12345", title: "Colon: inside", read: true },
      "\n<p>body</p>\n"
    );

    const parsed = parseFrontMatter(text);

    expect(parsed.data).toEqual({
      guid: "12345",
      title: "Colon: inside",
      read: true,
    });
    expect(parsed.body).toBe("\n<p>body</p>\n");
  });

  it("rejects documents without a header", () => {
    expect(() => parseFrontMatter("just text")).toThrow("no front matter block");
  });

  it("rejects headers that are not mappings", () => {
    expect(() => parseFrontMatter("---\n- a\n- b\n---\n")).toThrow(
      "front matter is not a mapping"
    );
  });
});
