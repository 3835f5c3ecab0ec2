/**
 * Item factories shared by module tests
 */

import { MemoryStorage } from "../storage/memory";
import { loadDefaultConfig } from "../utils/load-config";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";
import { createSiteContext } from "./context";
import type {
  BuildRuntime,
  Metadata,
  PageItem,
  PostItem,
  SiteConfig,
  SiteContext,
} from "../types";

export const BUILD_TIME = new Date("2024-06-01T00:00:00Z");

export async function makeContext(
  overrides: Partial<SiteConfig> = {},
  buildTime: Date = BUILD_TIME,
): Promise<SiteContext> {
  const config = { ...(await loadDefaultConfig()), ...overrides };
  return createSiteContext(config, new Tracker(() => buildTime), buildTime);
}

export function makeRuntime(
  source: MemoryStorage = new MemoryStorage(),
  output: MemoryStorage = new MemoryStorage(),
  signal?: AbortSignal,
): BuildRuntime & { source: MemoryStorage; output: MemoryStorage } {
  return { source, output, logger: new Logger("silent"), signal };
}

export function makeMetadata(overrides: Partial<Metadata> = {}): Metadata {
  return { categories: [], tags: [], draft: false, extra: {}, ...overrides };
}

export function makePost(
  name: string,
  date: string,
  metadata: Partial<Metadata> = {},
): PostItem {
  return {
    kind: "post",
    sourcePath: `content/posts/${name}.md`,
    destinationPath: `blog/${name}/index.html`,
    url: `/blog/${name}/`,
    metadata: makeMetadata({ title: name, date: new Date(date), ...metadata }),
    content: `<p>${name}</p>`,
    date: new Date(date),
    readingTime: 0,
    summary: name,
    previous: null,
    next: null,
  };
}

export function makePage(name: string, metadata: Partial<Metadata> = {}): PageItem {
  return {
    kind: "page",
    sourcePath: `content/${name}.md`,
    destinationPath: `${name}/index.html`,
    url: `/${name}/`,
    metadata: makeMetadata({ title: name, ...metadata }),
    content: `<p>${name}</p>`,
  };
}
