/**
 * Convert arbitrary text into a URL-safe slug
 *
 * Lowercases, strips everything outside [a-z0-9\s-], turns whitespace runs
 * into single hyphens, collapses repeated hyphens and trims them from both
 * ends. Empty input (or input that cleans down to nothing) becomes "untitled".
 *
 * @example
 * slugify("Hello, World!") // "hello-world"
 * slugify("  --Go  Tips-- ") // "go-tips"
 * slugify("") // "untitled"
 */
export function slugify(text: string | null | undefined): string {
  if (!text || text.trim() === "") return "untitled";

  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "")
    .replace(/\s+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug || "untitled";
}
