/**
 * Track Reference Resolver
 * 
 * Turns the identifier of a track clause into a concrete track source.
 * Numeric identifiers select a stream of the video source; anything else
 * is an extension alias for a file next to the specification file.
 */

import { MissingTrackFileError } from '@encode-spec/core';
import { withExtension, type FileSystem } from '@encode-spec/utils';
import { U8_MAX } from './constants.js';
import type { TrackSource } from './types.js';

const NUMERIC_IDENTIFIER = /^\d+$/;
const INDEXED_ALIAS = /^(\d+)\.(.+)$/;

// Stream indexes are small integers; larger numbers fall through to aliases
function parseTrackIndex(literal: string): number | undefined {
  const index = Number.parseInt(literal, 10);
  return index <= U8_MAX ? index : undefined;
}

/**
 * Resolve a track identifier against the file the specification belongs to.
 *
 * - `2` is stream 2 of the video source
 * - `ac3` is `<stem>.ac3` beside `sourceFile`, `eng.srt` is `<stem>.eng.srt`
 * - `1.ac3` is `<stem>.1.ac3` when that file exists, otherwise track 1
 *   of `<stem>.ac3`
 *
 * External files must exist.
 */
export function resolveTrackSource(
  identifier: string,
  sourceFile: string,
  fileSystem: FileSystem
): TrackSource {
  if (NUMERIC_IDENTIFIER.test(identifier)) {
    const index = parseTrackIndex(identifier);
    if (index !== undefined) {
      return { kind: 'video', index };
    }
  }

  const path = withExtension(sourceFile, identifier);
  if (fileSystem.exists(path)) {
    return { kind: 'external', path };
  }

  const indexed = INDEXED_ALIAS.exec(identifier);
  const trackIndex = indexed?.[1] === undefined ? undefined : parseTrackIndex(indexed[1]);
  const alias = indexed?.[2];
  if (trackIndex !== undefined && alias !== undefined) {
    const aliasPath = withExtension(sourceFile, alias);
    if (fileSystem.exists(aliasPath)) {
      return { kind: 'external', path: aliasPath, trackIndex };
    }
  }

  throw new MissingTrackFileError(identifier, path);
}
