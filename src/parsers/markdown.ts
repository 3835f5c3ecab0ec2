import { Marked } from "marked";
import { parseFrontmatter } from "./frontmatter";
import type { ContentParser, ParsedContent } from "../types";

const marked = new Marked({ gfm: true });

/**
 * Markdown with a YAML frontmatter header
 */
export const markdownParser: ContentParser = {
  extensions: [".md", ".markdown"],

  async parse(raw: string): Promise<ParsedContent> {
    const { metadata, body } = parseFrontmatter(raw);
    const html = await marked.parse(body);
    return { metadata, html };
  },
};
