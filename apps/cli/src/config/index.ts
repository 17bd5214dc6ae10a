/**
 * CLI Configuration
 */

import 'dotenv/config';
import { z } from 'zod';

// Environment schema
const envSchema = z.object({
  ENCODE_SPEC_FORMATS: z.string().optional(),
  ENCODE_SPEC_OUTPUT: z.enum(['pretty', 'json']).default('pretty'),
  ENCODE_SPEC_OUTPUT_DIR: z.string().min(1).optional(),
});

export type OutputFormat = z.infer<typeof envSchema>['ENCODE_SPEC_OUTPUT'];

export interface CliConfig {
  // Specification used when none is passed on the command line
  defaultFormats?: string;
  outputFormat: OutputFormat;
  outputDir?: string;
}

export function loadConfig(env: Record<string, string | undefined>): CliConfig {
  const parsed = envSchema.parse(env);
  return {
    defaultFormats: parsed.ENCODE_SPEC_FORMATS,
    outputFormat: parsed.ENCODE_SPEC_OUTPUT,
    outputDir: parsed.ENCODE_SPEC_OUTPUT_DIR,
  };
}

export const config: CliConfig = loadConfig(process.env);
