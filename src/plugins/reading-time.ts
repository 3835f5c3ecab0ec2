import { checkCancelled } from "../utils/errors";
import type { Plugin } from "../types";

export const WORDS_PER_MINUTE = 225;

/**
 * Minutes needed to read rendered HTML, rounded up; 0 for no words
 */
export function readingTime(html: string): number {
  const text = html.replace(/<[^>]*>/g, " ");
  const words = text.match(/[\w'-]+/g)?.length ?? 0;
  return Math.ceil(words / WORDS_PER_MINUTE);
}

export const readingTimePlugin: Plugin = {
  name: "reading-time",
  hooks: {
    postContentProcessing({ context, signal }) {
      for (const post of context.posts) {
        checkCancelled(signal);
        post.readingTime = readingTime(post.content);
      }
    },
  },
};
