/**
 * Content item type definitions
 *
 * Items are a tagged union on `kind`; stages dispatch on the tag
 * instead of relying on subclass overrides.
 */

// ============================================================================
// Metadata (frontmatter)
// ============================================================================

export interface Metadata {
  title?: string;
  date?: Date;
  lastModified?: Date;
  layout?: string;
  categories: string[];
  tags: string[];
  draft: boolean;
  url?: string; // Explicit URL override, bypasses the permalink template
  slug?: string;
  summary?: string;
  // Unrecognised frontmatter keys, for plugins and templates
  extra: Record<string, unknown>;
}

// ============================================================================
// SEO payload (filled by the seo plugin)
// ============================================================================

export interface SeoData {
  title: string;
  metaDescription: string;
  canonicalUrl: string;
  ogType: string;
  ogUrl: string;
  ogTitle: string;
  ogDescription: string;
  ogImage?: string;
  ogLocale?: string;
  articlePublishedTime?: string;
  articleModifiedTime?: string;
  articleTags?: string[];
  twitterCard: string; // "summary" or "summary_large_image" unless overridden
  twitterSite?: string;
  twitterCreator?: string;
  twitterTitle: string;
  twitterDescription: string;
  twitterImage?: string;
}

// ============================================================================
// Taxonomies
// ============================================================================

export const TAXONOMY_TYPES = ["category", "tag"] as const;
export type TaxonomyType = (typeof TAXONOMY_TYPES)[number];

export interface TaxonomyTerm {
  taxonomy: TaxonomyType;
  key: string; // Trimmed, case-folded lookup key
  name: string; // First-seen casing, used for display
  slug: string;
  posts: PostItem[];
}

// ============================================================================
// Pager
// ============================================================================

export interface Pager {
  currentPage: number; // 1-based
  totalPages: number;
  totalItems: number;
  itemsPerPage: number;
  previousPageUrl: string | null;
  nextPageUrl: string | null;
  firstPageUrl: string;
  pageUrlTemplate: string; // e.g. "/blog/page/:num/"
  hasPreviousPage: boolean;
  hasNextPage: boolean;
}

// ============================================================================
// Content items
// ============================================================================

interface ContentBase {
  sourcePath: string; // Root-relative path in the source storage
  destinationPath: string; // Root-relative path in the output storage, no leading slash
  url: string;
  metadata: Metadata;
  content: string; // Body HTML
  seo?: SeoData;
}

export interface PostItem extends ContentBase {
  kind: "post";
  date: Date;
  readingTime: number; // Minutes
  summary: string;
  previous: PostItem | null; // Older neighbour in date-descending order
  next: PostItem | null; // Newer neighbour
}

export interface PageItem extends ContentBase {
  kind: "page";
}

export type ListType = "blog" | TaxonomyType;

export interface ListPageItem extends ContentBase {
  kind: "list";
  listType: ListType;
  term: TaxonomyTerm | null; // null for the blog feed
  posts: PostItem[]; // Posts on this page only
  pager: Pager;
}

export type ContentItem = PostItem | PageItem | ListPageItem;
export type ContentKind = ContentItem["kind"];
