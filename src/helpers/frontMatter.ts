import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

// Must start with --- on its own line, end with --- on its own line
const FRONT_MATTER_REGEX =
  /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

export interface FrontMatterDocument {
  data: Record<string, unknown>;
  body: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function renderFrontMatter(
  data: Record<string, unknown>,
  body: string
): string {
  return `---\n${stringifyYaml(data, { lineWidth: 0 })}---\n${body}`;
}

/**
 * Splits a document into its YAML header and body. Throws when the header
 * is missing or is not a mapping.
 */
export function parseFrontMatter(document: string): FrontMatterDocument {
  const match = FRONT_MATTER_REGEX.exec(document);
  if (!match) {
    throw new Error("no front matter block");
  }

  const data: unknown = parseYaml(match[1]);
  if (!isRecord(data)) {
    throw new Error("front matter is not a mapping");
  }

  return { data, body: document.slice(match[0].length) };
}
