/**
 * Pipeline checkpoint and plugin contracts
 */

import type { SiteContext } from "./context";
import type { Storage } from "./storage";
import type { Logger } from "../utils/logger";

// ============================================================================
// Pipeline stages
// ============================================================================

export const PIPELINE_STAGES = [
  "preBuild",
  "postContentProcessing",
  "postRender",
  "postBuild",
  "buildComplete",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

// ============================================================================
// Plugins
// ============================================================================

/**
 * Arguments handed to a plugin hook.
 * Hooks run strictly between stages, so they may mutate the context freely.
 */
export interface PluginHookArgs {
  stage: PipelineStage;
  context: SiteContext;
  source: Storage;
  output: Storage;
  signal?: AbortSignal;
  logger: Logger;
}

export type PluginHook = (args: PluginHookArgs) => void | Promise<void>;

export interface Plugin {
  name: string;
  /** Only the stages a plugin implements are ever dispatched to it */
  hooks: Partial<Record<PipelineStage, PluginHook>>;
}
