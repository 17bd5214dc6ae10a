/**
 * Output Naming
 *
 * Encoded outputs are written beside their source as
 * `<stem>.<encoder>-q<crf>.<ext>` (or `<stem>.copy.<ext>`), which is also
 * how already-processed files are recognised when scanning a directory.
 */

import { basename, dirname, join } from 'node:path';
import { getBasename } from '@encode-spec/utils';
import { VIDEO_ENCODERS } from './constants.js';
import type { OutputJobConfig, TrackSpec } from './types.js';

const PROCESSED_MARKERS = VIDEO_ENCODERS
  .filter((encoder) => encoder !== 'copy')
  .map((encoder) => `.${encoder}-q`);

export function getOutputSuffix(output: OutputJobConfig): string {
  const { video } = output;
  return video.encoder === 'copy' ? 'copy' : `${video.encoder}-q${video.crf}`;
}

/**
 * Path of the encoded file for `output`, beside `sourceFile` unless an
 * output directory is given
 */
export function buildOutputPath(
  sourceFile: string,
  output: OutputJobConfig,
  outputDir?: string
): string {
  const filename = `${getBasename(sourceFile)}.${getOutputSuffix(output)}.${output.outputExtension}`;
  return join(outputDir ?? dirname(sourceFile), filename);
}

/**
 * Whether a file looks like the product of an earlier encode
 */
export function isProcessedFile(filePath: string): boolean {
  const stem = getBasename(filePath);
  return PROCESSED_MARKERS.some((marker) => stem.includes(marker)) || stem.endsWith('.copy');
}

function describeTracks(tracks: readonly TrackSpec[]): string {
  return tracks
    .map((track) => {
      const source = track.source.kind === 'video'
        ? `#${track.source.index}`
        : track.source.trackIndex === undefined
          ? basename(track.source.path)
          : `${basename(track.source.path)}#${track.source.trackIndex}`;
      const flags = [track.enabled ? 'default' : '', track.forced ? 'forced' : '']
        .filter(Boolean)
        .join('+');
      return flags ? `${source} (${flags})` : source;
    })
    .join(' | ');
}

/**
 * One-line summary of an output, e.g.
 * `aom q=16 s=4 p=film grain=0 compat=0, mkv, audio copy`
 */
export function describeOutput(output: OutputJobConfig): string {
  const { video, audio } = output;
  const parts: string[] = [];

  switch (video.encoder) {
    case 'copy':
      parts.push('video copy');
      break;
    case 'aom':
      parts.push(`aom q=${video.crf} s=${video.speed} p=${video.profile} grain=${video.grain} compat=${video.compat ? 1 : 0}`);
      break;
    case 'rav1e':
    case 'svt':
      parts.push(`${video.encoder} q=${video.crf} s=${video.speed} p=${video.profile} grain=${video.grain}`);
      break;
    case 'x264':
    case 'x265':
      parts.push(`${video.encoder} q=${video.crf} p=${video.profile} compat=${video.compat ? 1 : 0}`);
      break;
  }

  parts.push(output.outputExtension);
  if (output.bitDepthOverride !== undefined) {
    parts.push(`${output.bitDepthOverride}-bit`);
  }
  if (output.resolutionOverride !== undefined) {
    parts.push(`${output.resolutionOverride.width}x${output.resolutionOverride.height}`);
  }

  parts.push(
    audio.encoder === 'copy' || audio.encoder === 'flac'
      ? `audio ${audio.encoder}`
      : `audio ${audio.encoder} ${audio.kbpsPerChannel}k/ch`
  );
  if (output.audioNormalize) {
    parts.push('normalized');
  }
  if (output.audioTracks.length > 0) {
    parts.push(`audio tracks ${describeTracks(output.audioTracks)}`);
  }
  if (output.subtitleTracks.length > 0) {
    parts.push(`subtitles ${describeTracks(output.subtitleTracks)}`);
  }

  return parts.join(', ');
}
