/**
 * Resolve Command
 * 
 * Resolve a specification string into the outputs it describes.
 */

import chalk from 'chalk';
import {
  buildOutputPath,
  describeOutput,
  tryResolveOutputs,
} from '@encode-spec/jobspec';
import { createLogger } from '@encode-spec/utils';
import { config } from '../config/index.js';
import { printError, printHeader, printInfo, printJson, printKeyValue } from '../lib/output.js';

const log = createLogger({ module: 'cli' });

export interface ResolveOptions {
  json?: boolean;
  outputDir?: string;
}

export function resolveCommand(
  source: string,
  formats: string | undefined,
  options: ResolveOptions
): void {
  const specification = formats ?? config.defaultFormats;
  const outputDir = options.outputDir ?? config.outputDir;
  const result = tryResolveOutputs(specification, source);

  if (!result.success) {
    const { error } = result;
    log.error({ source, code: error.code, details: error.details }, error.message);
    printError(`${error.code}: ${error.message}`);
    process.exitCode = 1;
    return;
  }

  const resolved = result.outputs.map((output) => ({
    path: buildOutputPath(source, output, outputDir),
    ...output,
  }));

  if (options.json ?? config.outputFormat === 'json') {
    printJson(resolved);
    return;
  }

  if (specification === undefined) {
    printInfo('No specification given, using the default output');
  }

  printHeader(`Outputs for ${source}`);
  resolved.forEach((output, index) => {
    console.log(`${chalk.cyan(`#${index}`)} ${describeOutput(output)}`);
    printKeyValue('File', output.path);
  });
}
