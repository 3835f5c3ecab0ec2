/**
 * Post summary generation
 */

import * as cheerio from "cheerio";

export const SUMMARY_MAX_LENGTH = 250;

/**
 * Plain-text summary from the first paragraph of rendered HTML
 *
 * Text longer than `maxLength` is cut after the last sentence end, if that
 * falls past half of `maxLength`; otherwise at the last space, with "...".
 * Returns "" when the HTML holds no text.
 */
export function generateSummary(
  html: string,
  maxLength: number = SUMMARY_MAX_LENGTH,
): string {
  const $ = cheerio.load(html);
  const paragraph = $("p").first();
  const source = paragraph.length > 0 ? paragraph.text() : $.root().text();
  const text = source.replace(/\s+/g, " ").trim();

  if (text.length <= maxLength) return text;

  const window = text.slice(0, maxLength);
  const sentenceEnd = Math.max(
    window.lastIndexOf("."),
    window.lastIndexOf("!"),
    window.lastIndexOf("?"),
  );
  if (sentenceEnd > maxLength * 0.5) {
    return text.slice(0, sentenceEnd + 1).trim();
  }

  const space = window.lastIndexOf(" ");
  if (space > 0) {
    return `${text.slice(0, space).trim()}...`;
  }
  return `${window.trim()}...`;
}
