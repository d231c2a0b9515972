const MAX_SLUG_LENGTH = 80;

/**
 * Lowercases the input and collapses every run of characters outside
 * [a-z0-9] into a single dash.
 */
export function slugify(input: string, maxLength = MAX_SLUG_LENGTH): string {
  const slug = input
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug.slice(0, maxLength).replace(/-+$/, "");
}
