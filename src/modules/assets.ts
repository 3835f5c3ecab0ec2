/**
 * Assets Module
 * Compiles the stylesheet entry point and copies static files
 */

import { checkCancelled, errorMessage } from "../utils/errors";
import { joinPath, relativePath } from "../utils/storage-path";
import type { AssetCompiler, BuildRuntime, SiteContext } from "../types";

/**
 * Output path of the compiled entry point, e.g. "styles/main.scss" -> "css/main.css"
 */
export function stylesheetOutputPath(entryPoint: string): string {
  const name = entryPoint.split("/").pop() ?? entryPoint;
  return `css/${name.replace(/\.(scss|sass|css)$/i, "")}.css`;
}

export async function compileStyles(
  ctx: SiteContext,
  runtime: BuildRuntime,
  compiler: AssetCompiler,
): Promise<void> {
  const { config, tracker } = ctx;
  const { source, output, logger } = runtime;
  const entryPath = joinPath(config.stylesDirectory, config.styleEntryPoint);

  if (!(await source.exists(entryPath))) {
    logger.warn(`Stylesheet ${entryPath} not found, skipping`);
    return;
  }

  try {
    const scss = await source.readText(entryPath);
    const css = await compiler.compile(scss, entryPath, source, config.styleOutputStyle);
    await output.writeText(stylesheetOutputPath(config.styleEntryPoint), css);
    tracker.incrementStylesheets();
  } catch (error) {
    tracker.trackError(entryPath, error, "asset", "parse");
    logger.error(`Failed to compile ${entryPath}: ${errorMessage(error)}`, error);
  }
}

/**
 * Copy every file below the static directory to the same relative path
 */
export async function copyStatic(ctx: SiteContext, runtime: BuildRuntime): Promise<void> {
  const { config, tracker } = ctx;
  const { source, output, logger, signal } = runtime;

  const files = await source.listFiles(config.staticDirectory, "*", true);

  for (const path of files) {
    checkCancelled(signal);

    const target = relativePath(config.staticDirectory, path);
    try {
      await output.writeBytes(target, await source.readBytes(path));
      tracker.incrementCopied();
    } catch (error) {
      tracker.trackError(path, error, "asset", "write");
      logger.error(`Failed to copy ${path}: ${errorMessage(error)}`, error);
    }
  }

  logger.debug(`Copied ${files.length} static files`);
}

/**
 * Compile styles, then copy static files
 */
export async function assets(
  ctx: SiteContext,
  runtime: BuildRuntime,
  compiler: AssetCompiler,
): Promise<void> {
  await compileStyles(ctx, runtime, compiler);
  await copyStatic(ctx, runtime);
}
