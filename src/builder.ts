/**
 * Builder - Pipeline orchestrator
 * Sequences configuration, discovery, post-processing, plugins, rendering
 * and assets into one build. Business logic lives in the modules.
 */

import * as modules from "./modules";
import { createParserRegistry, type ParserRegistry } from "./parsers";
import { createPlugins, PluginDispatcher } from "./plugins";
import { SassCompiler } from "./styles/sass-compiler";
import { HandlebarsRenderer } from "./templates";
import {
  checkCancelled,
  errorMessage,
  isCancellation,
  loadConfig,
  Logger,
  Tracker,
} from "./utils";
import type {
  AssetCompiler,
  BuildStats,
  BuildRuntime,
  PartialSiteConfig,
  PipelineStage,
  Plugin,
  SiteContext,
  Storage,
  TemplateRenderer,
} from "./types";

export type BuildStatus = "success" | "failed" | "cancelled";

export type BuildStep =
  | "config"
  | PipelineStage
  | "templates"
  | "discover"
  | "post-process"
  | "paginate"
  | "render"
  | "assets";

export interface BuildOptions {
  signal?: AbortSignal;
  logger?: Logger;
  parsers?: ParserRegistry;
  renderer?: TemplateRenderer;
  compiler?: AssetCompiler;
  /** Replaces the plugins named in the site config */
  plugins?: Plugin[];
  now?: () => Date;
  /** Applied over every config layer, e.g. CLI flags */
  overrides?: PartialSiteConfig;
  /** null skips the user config in the OS config directory */
  userConfigPath?: string | null;
  /** Called as each step starts, e.g. to update a spinner */
  onStep?: (step: BuildStep) => void;
}

export interface BuildResult {
  status: BuildStatus;
  /** Per-item issues recorded by the tracker */
  errorCount: number;
  stats: BuildStats;
  /** Absent when the build stopped before the context was created */
  context?: SiteContext;
  /** The exception that failed or cancelled the build */
  error?: unknown;
}

/**
 * Run one build from `source` into `output`
 *
 * Per-item failures are tracked and never change the status. An exception
 * thrown by a step itself fails the build; cancellation through
 * `options.signal` stops it between items and reports "cancelled".
 * Files already written are left in place either way.
 */
export async function build(
  configPath: string,
  source: Storage,
  output: Storage,
  options: BuildOptions = {},
): Promise<BuildResult> {
  const { signal, onStep } = options;
  const logger = options.logger ?? new Logger("silent");
  const now = options.now ?? (() => new Date());
  const tracker = new Tracker(now);
  const runtime: BuildRuntime = { source, output, logger, signal };
  let context: SiteContext | undefined;

  const step = (name: BuildStep): void => {
    checkCancelled(signal);
    logger.debug(`Step: ${name}`);
    onStep?.(name);
  };

  try {
    step("config");
    const { config, errors, siteConfigFound } = await loadConfig({
      storage: source,
      configPath,
      overrides: options.overrides,
      userConfigPath: options.userConfigPath,
    });

    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
      logger.warn(`Ignoring config ${err.path}: ${errorMessage(err.error)}`);
    }
    if (!siteConfigFound) {
      logger.warn(`No site config at ${configPath}, using defaults`);
    }

    const ctx = modules.createSiteContext(config, tracker, now());
    context = ctx;

    const dispatcher = new PluginDispatcher(
      options.plugins ?? createPlugins(config.plugins, logger),
    );
    const renderer = options.renderer ?? new HandlebarsRenderer(logger);
    const compiler = options.compiler ?? new SassCompiler();
    const parsers = options.parsers ?? createParserRegistry();

    step("preBuild");
    await dispatcher.dispatch("preBuild", ctx, runtime);

    step("templates");
    await output.createDirectory("");
    await renderer.initialize(config, source);

    step("discover");
    await modules.discover(ctx, runtime, parsers);

    step("postContentProcessing");
    await dispatcher.dispatch("postContentProcessing", ctx, runtime);

    step("post-process");
    modules.postProcess(ctx);

    step("paginate");
    modules.paginate(ctx);

    step("render");
    await modules.render(ctx, runtime, renderer);

    step("postRender");
    await dispatcher.dispatch("postRender", ctx, runtime);

    step("assets");
    await modules.assets(ctx, runtime, compiler);

    step("postBuild");
    await dispatcher.dispatch("postBuild", ctx, runtime);

    step("buildComplete");
    await dispatcher.dispatch("buildComplete", ctx, runtime);

    return result("success");
  } catch (error) {
    if (isCancellation(error, signal)) {
      logger.warn("Build cancelled");
      return result("cancelled", error);
    }

    logger.error(`Build failed: ${errorMessage(error)}`, error);
    return result("failed", error);
  }

  function result(status: BuildStatus, error?: unknown): BuildResult {
    return {
      status,
      errorCount: tracker.getErrorCount(),
      stats: tracker.getStats(),
      context,
      error,
    };
  }
}
