/**
 * Plugin Dispatcher
 * Runs registered plugin hooks at each pipeline checkpoint, in registration order
 */

import { PIPELINE_STAGES } from "../types";
import type {
  BuildRuntime,
  PipelineStage,
  Plugin,
  PluginHook,
  SiteContext,
} from "../types";
import { checkCancelled, errorMessage, isCancellation } from "../utils/errors";

interface RegisteredHook {
  plugin: string;
  hook: PluginHook;
}

export class PluginDispatcher {
  // stage -> hooks, in registration order
  private handlers = new Map<PipelineStage, RegisteredHook[]>(
    PIPELINE_STAGES.map((stage) => [stage, []]),
  );
  private plugins: Plugin[] = [];

  constructor(plugins: Plugin[] = []) {
    for (const plugin of plugins) {
      this.register(plugin);
    }
  }

  register(plugin: Plugin): void {
    this.plugins.push(plugin);

    for (const stage of PIPELINE_STAGES) {
      const hook = plugin.hooks[stage];
      if (hook) {
        this.handlers.get(stage)?.push({ plugin: plugin.name, hook });
      }
    }
  }

  getPlugins(): readonly Plugin[] {
    return this.plugins;
  }

  /**
   * Names of the plugins that implement a stage
   */
  handlersFor(stage: PipelineStage): string[] {
    return (this.handlers.get(stage) ?? []).map((entry) => entry.plugin);
  }

  /**
   * Invoke every hook registered for a stage
   *
   * A failing hook is logged and tracked, and the next hook still runs.
   * Cancellation stops dispatch and propagates to the caller.
   */
  async dispatch(
    stage: PipelineStage,
    context: SiteContext,
    runtime: BuildRuntime,
  ): Promise<void> {
    const { source, output, logger, signal } = runtime;

    for (const { plugin, hook } of this.handlers.get(stage) ?? []) {
      checkCancelled(signal);

      try {
        logger.debug(`Running ${plugin} (${stage})`);
        await hook({ stage, context, source, output, signal, logger });
      } catch (error) {
        if (isCancellation(error, signal)) throw error;

        context.tracker.trackIssue({
          type: "plugin",
          plugin,
          stage,
          details: errorMessage(error),
        });
        logger.error(`Plugin ${plugin} failed during ${stage}: ${errorMessage(error)}`, error);
      }
    }
  }
}
