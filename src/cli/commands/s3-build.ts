/**
 * S3 build command - Builds a site stored in an S3 bucket
 */

import { S3Client } from "@aws-sdk/client-s3";
import { z } from "zod";
import { S3Storage } from "../../storage";
import { runBuild } from "../run-build";
import { overridesFromFlags } from "./build";

const S3BuildOptionsSchema = z.object({
  bucket: z.string().min(1),
  prefix: z.string().default(""),
  outputBucket: z.string().optional(),
  outputPrefix: z.string().default("_site"),
  region: z.string().optional(),
  config: z.string().default("config.json"),
  drafts: z.boolean().optional(),
  future: z.boolean().optional(),
  baseUrl: z.string().optional(),
  strict: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof S3BuildOptionsSchema>;

export async function s3BuildCommand(opts: Options): Promise<void> {
  const options = S3BuildOptionsSchema.parse(opts);
  // Credentials come from the default AWS provider chain
  const client = new S3Client(options.region ? { region: options.region } : {});

  const code = await runBuild({
    configPath: options.config,
    source: new S3Storage({ client, bucket: options.bucket, prefix: options.prefix }),
    output: new S3Storage({
      client,
      bucket: options.outputBucket ?? options.bucket,
      prefix: options.outputPrefix,
    }),
    overrides: overridesFromFlags(options),
    verbose: options.verbose,
    strict: options.strict,
  });

  if (code !== 0) process.exit(code);
}
