/**
 * Site context construction
 */

import { TAXONOMY_TYPES } from "../types";
import type { SiteConfig, SiteContext, TaxonomyTerms, TaxonomyType } from "../types";
import type { Tracker } from "../utils/tracker";

export function createSiteContext(
  config: SiteConfig,
  tracker: Tracker,
  buildTime: Date,
): SiteContext {
  return {
    config,
    buildTime,
    tracker,
    posts: [],
    pages: [],
    otherContent: [],
    taxonomies: new Map<TaxonomyType, TaxonomyTerms>(
      TAXONOMY_TYPES.map((type) => [type, new Map()]),
    ),
    listPages: [],
  };
}
