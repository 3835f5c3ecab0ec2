/**
 * Build command - Builds a site from a local directory
 */

import path from "node:path";
import { z } from "zod";
import { LocalStorage } from "../../storage";
import { loadConfig } from "../../utils";
import type { PartialSiteConfig } from "../../types";
import { runBuild } from "../run-build";

const BuildOptionsSchema = z.object({
  source: z.string().default("."),
  output: z.string().optional(),
  config: z.string().default("config.json"),
  drafts: z.boolean().optional(),
  future: z.boolean().optional(),
  baseUrl: z.string().optional(),
  strict: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof BuildOptionsSchema>;

/**
 * Config overrides for the flags that were actually given
 */
export function overridesFromFlags(flags: {
  drafts?: boolean;
  future?: boolean;
  baseUrl?: string;
}): PartialSiteConfig {
  const overrides: PartialSiteConfig = {};
  if (flags.drafts !== undefined) overrides.buildDrafts = flags.drafts;
  if (flags.future !== undefined) overrides.buildFutureDated = flags.future;
  if (flags.baseUrl !== undefined) overrides.baseUrl = flags.baseUrl;
  return overrides;
}

export async function buildCommand(opts: Options): Promise<void> {
  const options = BuildOptionsSchema.parse(opts);
  const overrides = overridesFromFlags(options);
  const source = new LocalStorage(options.source);

  // Without --output, write to the configured output directory inside the source
  let outputRoot = options.output;
  if (!outputRoot) {
    const { config } = await loadConfig({
      storage: source,
      configPath: options.config,
      overrides,
    });
    outputRoot = path.join(source.root, config.outputDirectory);
  }

  const code = await runBuild({
    configPath: options.config,
    source,
    output: new LocalStorage(outputRoot),
    overrides,
    verbose: options.verbose,
    strict: options.strict,
  });

  if (code !== 0) process.exit(code);
}
