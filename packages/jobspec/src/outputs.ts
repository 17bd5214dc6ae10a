/**
 * Multi-Output Splitter
 *
 * A specification string describes one output per `;`-separated segment.
 * Each segment is parsed and resolved on its own; the first failing
 * segment aborts the whole string.
 */

import { isParseError, type ParseError } from '@encode-spec/core';
import { createLogger, isNonEmptyString } from '@encode-spec/utils';
import { parseFilters, type ParseOptions } from './parser.js';
import { defaultOutput, resolveOutput } from './resolver.js';
import type { OutputJobConfig } from './types.js';

const log = createLogger({ module: 'jobspec' });

export type ResolveOptions = ParseOptions;

export type ResolveResult =
  | { success: true; outputs: OutputJobConfig[] }
  | { success: false; error: ParseError };

/**
 * Split a specification string into its non-empty segments
 */
export function splitSegments(specification: string): string[] {
  return specification.split(';').filter(isNonEmptyString);
}

/**
 * Resolve every output described by `specification` for `sourceFile`.
 *
 * A missing or blank specification (or one made only of empty segments)
 * yields the single default output.
 * Throws the first `ParseError` encountered.
 */
export function resolveOutputs(
  specification: string | null | undefined,
  sourceFile: string,
  options: ResolveOptions = {}
): OutputJobConfig[] {
  const segments = isNonEmptyString(specification) ? splitSegments(specification) : [];
  if (segments.length === 0) {
    return [defaultOutput()];
  }

  const outputs: OutputJobConfig[] = [];

  for (const [index, segment] of segments.entries()) {
    try {
      const output = resolveOutput(parseFilters(segment, sourceFile, options));
      log.debug({ sourceFile, segment: index, encoder: output.video.encoder }, 'Resolved output');
      outputs.push(output);
    } catch (error) {
      if (isParseError(error)) {
        log.warn(
          { sourceFile, segment: index, code: error.code, details: error.details },
          `Invalid output specification: ${error.message}`
        );
      }
      throw error;
    }
  }

  return outputs;
}

/**
 * Like `resolveOutputs`, but reports specification errors as a result
 * instead of throwing them
 */
export function tryResolveOutputs(
  specification: string | null | undefined,
  sourceFile: string,
  options: ResolveOptions = {}
): ResolveResult {
  try {
    return { success: true, outputs: resolveOutputs(specification, sourceFile, options) };
  } catch (error) {
    if (isParseError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}
