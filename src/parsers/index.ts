/**
 * Content parsers, selected by file extension
 */

import { markdownParser } from "./markdown";
import { htmlParser } from "./html";
import type { ContentParser } from "../types";

export { markdownParser, htmlParser };
export { parseFrontmatter, toMetadata } from "./frontmatter";

export type ParserRegistry = Map<string, ContentParser>;

export const DEFAULT_PARSERS: readonly ContentParser[] = [markdownParser, htmlParser];

/**
 * Index parsers by lower-cased extension; later parsers win on conflicts
 */
export function createParserRegistry(
  parsers: readonly ContentParser[] = DEFAULT_PARSERS,
): ParserRegistry {
  const registry: ParserRegistry = new Map();
  for (const parser of parsers) {
    for (const extension of parser.extensions) {
      registry.set(extension.toLowerCase(), parser);
    }
  }
  return registry;
}

/**
 * Get the parser registered for a path's extension
 */
export function getParser(
  registry: ParserRegistry,
  path: string,
): ContentParser | undefined {
  const match = path.toLowerCase().match(/\.[a-z0-9]+$/);
  return match ? registry.get(match[0]) : undefined;
}
