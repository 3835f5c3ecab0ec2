/**
 * Shared build runner for the CLI commands
 * Wires SIGINT to cancellation, drives the spinner and prints the summary
 */

import ora from "ora";
import { build, type BuildResult, type BuildStep } from "../builder";
import * as modules from "../modules";
import { Logger } from "../utils";
import type { PartialSiteConfig, Storage } from "../types";

export const EXIT_CANCELLED = 130;

const STEP_LABELS: Record<BuildStep, string> = {
  config: "Loading configuration...",
  preBuild: "Running preBuild plugins...",
  templates: "Loading templates...",
  discover: "Discovering content...",
  postContentProcessing: "Running content plugins...",
  "post-process": "Linking posts...",
  paginate: "Generating list pages...",
  render: "Rendering pages...",
  postRender: "Running postRender plugins...",
  assets: "Compiling assets...",
  postBuild: "Running postBuild plugins...",
  buildComplete: "Finishing...",
};

export interface RunBuildOptions {
  configPath: string;
  source: Storage;
  output: Storage;
  overrides: PartialSiteConfig;
  verbose?: boolean;
  strict?: boolean;
}

/**
 * Process exit code for a finished build
 * Per-item errors only count under --strict.
 */
export function exitCodeFor(result: BuildResult, strict: boolean = false): number {
  switch (result.status) {
    case "cancelled":
      return EXIT_CANCELLED;
    case "failed":
      return 1;
    case "success":
      return strict && result.errorCount > 0 ? 1 : 0;
  }
}

export async function runBuild(options: RunBuildOptions): Promise<number> {
  const { verbose = false, strict = false } = options;
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  // Debug output would fight the spinner for the terminal
  const spinner = ora({ text: "Initializing...", indent: 2, isEnabled: !verbose }).start();

  try {
    const result = await build(options.configPath, options.source, options.output, {
      signal: controller.signal,
      logger: new Logger(verbose ? "debug" : "warn"),
      overrides: options.overrides,
      onStep: (step) => {
        spinner.text = STEP_LABELS[step];
      },
    });

    switch (result.status) {
      case "success":
        spinner.stop();
        modules.stats(result.stats, { verbose });
        break;
      case "cancelled":
        spinner.warn("Build cancelled");
        break;
      case "failed":
        spinner.fail("Build failed");
        console.error(result.error);
        break;
    }

    return exitCodeFor(result, strict);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
