/**
 * Central type exports
 */

// Configuration
export type {
  SiteConfig,
  PartialSiteConfig,
  TaxonomyPaths,
  LayoutsConfig,
  FeedConfig,
  StyleOutputStyle,
  ConfigError,
} from "./config";
export { SiteConfigSchema, PartialSiteConfigSchema } from "./config";

// Content
export type {
  Metadata,
  SeoData,
  TaxonomyType,
  TaxonomyTerm,
  Pager,
  PostItem,
  PageItem,
  ListType,
  ListPageItem,
  ContentItem,
  ContentKind,
} from "./content";
export { TAXONOMY_TYPES } from "./content";

// Context
export type { SiteContext, TaxonomyTerms, BuildRuntime } from "./context";

// Pipeline
export type {
  PipelineStage,
  Plugin,
  PluginHook,
  PluginHookArgs,
} from "./pipeline";
export { PIPELINE_STAGES } from "./pipeline";

// Storage and collaborators
export type { Storage } from "./storage";
export type {
  ContentParser,
  ParsedContent,
  TemplateRenderer,
  AssetCompiler,
} from "./services";

// Tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  AssetIssue,
  PluginIssue,
  FileIssueReason,
  ResourceIssueReason,
  AssetIssueReason,
  BuildStats,
} from "../utils/tracker";
export { Tracker } from "../utils/tracker";
