/**
 * Collaborator contracts used by the build pipeline
 */

import type { Metadata } from "./content";
import type { SiteConfig, StyleOutputStyle } from "./config";
import type { Storage } from "./storage";

// ============================================================================
// Content Parser
// ============================================================================

export interface ParsedContent {
  metadata: Metadata;
  html: string;
}

export interface ContentParser {
  /** File extensions handled by this parser, with leading dot */
  readonly extensions: readonly string[];
  parse(raw: string, sourcePath: string): Promise<ParsedContent>;
}

// ============================================================================
// Template Renderer
// ============================================================================

export interface TemplateRenderer {
  /** Load and compile every template and include; called once per build */
  initialize(config: SiteConfig, storage: Storage): Promise<void>;
  /** Throws TemplateNotFoundError when the key was not loaded */
  render(templateKey: string, model: object): Promise<string>;
}

// ============================================================================
// Asset Compiler
// ============================================================================

export interface AssetCompiler {
  compile(
    source: string,
    sourcePath: string,
    storage: Storage,
    outputStyle: StyleOutputStyle,
  ): Promise<string>;
}
