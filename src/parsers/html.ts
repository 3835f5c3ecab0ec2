import { parseFrontmatter } from "./frontmatter";
import type { ContentParser, ParsedContent } from "../types";

/**
 * Raw HTML with an optional YAML frontmatter header; the body is used as-is
 */
export const htmlParser: ContentParser = {
  extensions: [".html", ".htm"],

  async parse(raw: string): Promise<ParsedContent> {
    const { metadata, body } = parseFrontmatter(raw);
    return { metadata, html: body.trim() };
  },
};
