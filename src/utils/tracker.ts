/**
 * Build Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import { TemplateNotFoundError, errorMessage } from "./errors";
import type { PipelineStage } from "../types/pipeline";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "read-error"
  | "parse-error"
  | "missing-date"
  | "duplicate-url"
  | "template-not-found"
  | "render-error"
  | "write-error";
export type ResourceIssueReason =
  | "not-found"
  | "invalid-json"
  | "schema-validation"
  | "read-error";
export type AssetIssueReason = "compile-error" | "copy-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface AssetIssue {
  type: "asset";
  path: string;
  reason: AssetIssueReason;
  details?: string;
}

export interface PluginIssue {
  type: "plugin";
  plugin: string;
  stage: PipelineStage;
  details: string;
}

export type Issue = FileIssue | ResourceIssue | AssetIssue | PluginIssue;
export type IssueType = Issue["type"];

export type FileErrorContext = "read" | "parse" | "render" | "write";

export interface BuildStats {
  // Content counts
  discoveredFiles: number;
  posts: number;
  pages: number;
  skippedDrafts: number;
  skippedFuture: number;
  failedFiles: number;

  // Output counts
  renderedItems: number;
  failedRenders: number;
  listPages: number;
  copiedFiles: number;
  compiledStylesheets: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function hasCode(error: unknown, ...codes: string[]): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (hasCode(error, "ENOENT")) {
    return { reason: "not-found", details: errorMessage(error) };
  }
  return { reason: "read-error", details: errorMessage(error) };
}

function mapFileError(
  error: unknown,
  context: FileErrorContext,
): IssueInfo<FileIssueReason> {
  const details = errorMessage(error);

  if (error instanceof TemplateNotFoundError) {
    return { reason: "template-not-found", details };
  }
  if (context !== "write" && hasCode(error, "ENOENT", "EACCES", "EPERM")) {
    return { reason: "read-error", details };
  }

  switch (context) {
    case "read":
      return { reason: "read-error", details };
    case "parse":
      return { reason: "parse-error", details };
    case "render":
      return { reason: "render-error", details };
    case "write":
      return { reason: "write-error", details };
  }
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private discoveredFiles = 0;
  private posts = 0;
  private pages = 0;
  private skippedDrafts = 0;
  private skippedFuture = 0;
  private failedFiles = 0;
  private renderedItems = 0;
  private failedRenders = 0;
  private listPages = 0;
  private copiedFiles = 0;
  private compiledStylesheets = 0;
  private issues: Issue[] = [];
  private startTime: Date;

  constructor(private now: () => Date = () => new Date()) {
    this.startTime = now();
  }

  // ============================================================================
  // Stat counters
  // ============================================================================

  setDiscoveredFiles(count: number): void {
    this.discoveredFiles = count;
  }

  incrementPosts(): void {
    this.posts++;
  }

  incrementPages(): void {
    this.pages++;
  }

  incrementSkippedDrafts(): void {
    this.skippedDrafts++;
  }

  incrementSkippedFuture(): void {
    this.skippedFuture++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementRendered(): void {
    this.renderedItems++;
  }

  incrementRenderFailed(): void {
    this.failedRenders++;
  }

  setListPages(count: number): void {
    this.listPages = count;
  }

  incrementCopied(): void {
    this.copiedFiles++;
  }

  incrementStylesheets(): void {
    this.compiledStylesheets++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource" | "asset",
    context: FileErrorContext = "parse",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
      case "asset": {
        const reason = context === "write" ? "copy-error" : "compile-error";
        this.issues.push({ type: "asset", path, reason, details: errorMessage(error) });
        break;
      }
    }
  }

  /**
   * Track an issue that did not originate from a thrown error
   */
  trackIssue(issue: Issue): void {
    this.issues.push(issue);
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  getErrorCount(): number {
    return this.issues.length;
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final build statistics
   */
  getStats(): BuildStats {
    const duration = this.now().getTime() - this.startTime.getTime();

    return {
      discoveredFiles: this.discoveredFiles,
      posts: this.posts,
      pages: this.pages,
      skippedDrafts: this.skippedDrafts,
      skippedFuture: this.skippedFuture,
      failedFiles: this.failedFiles,
      renderedItems: this.renderedItems,
      failedRenders: this.failedRenders,
      listPages: this.listPages,
      copiedFiles: this.copiedFiles,
      compiledStylesheets: this.compiledStylesheets,
      issues: this.issues,
      duration,
    };
  }
}
