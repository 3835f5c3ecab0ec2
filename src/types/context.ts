/**
 * Site context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { SiteConfig } from "./config";
import type {
  ContentItem,
  ListPageItem,
  PageItem,
  PostItem,
  TaxonomyTerm,
  TaxonomyType,
} from "./content";
import type { Storage } from "./storage";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

/** term key (trimmed, case-folded) -> term */
export type TaxonomyTerms = Map<string, TaxonomyTerm>;

export interface SiteContext {
  // Input - provided at initialization
  config: SiteConfig;
  buildTime: Date;

  // Unified tracking for stats and per-item errors
  tracker: Tracker;

  posts: PostItem[]; // Date descending after post-processing
  pages: PageItem[];
  otherContent: ContentItem[]; // Items contributed by plugins, rendered last
  taxonomies: Map<TaxonomyType, TaxonomyTerms>;
  listPages: ListPageItem[];
}

/**
 * Collaborators shared by every pipeline module for one build
 */
export interface BuildRuntime {
  source: Storage;
  output: Storage;
  logger: Logger;
  signal?: AbortSignal;
}
