/**
 * Configuration Resolver
 *
 * Folds the filter tokens of one segment into a complete output job
 * configuration. The video encoder is picked first, from anywhere in the
 * stream, so that every other filter is checked against it regardless of
 * clause order. A filter aimed at a field the chosen encoder does not have
 * is ignored.
 */

import {
  FilterValueOutOfRangeError,
  InvalidAudioBitrateError,
} from '@encode-spec/core';
import {
  AUDIO_BITRATE_RANGE,
  DEFAULT_AUDIO_KBPS_PER_CHANNEL,
  DEFAULT_OUTPUT_EXTENSION,
  GRAIN_RANGE,
  SPEED_RANGE,
} from './constants.js';
import { VIDEO_ENCODER_INFO, createVideoConfig } from './encoders.js';
import type {
  FilterToken,
  OutputJobConfig,
  Profile,
  VideoEncoderName,
  VideoJobConfig,
} from './types.js';

/**
 * The configuration used when no specification is given: x264 at crf 18
 * with the film profile, Matroska output, audio stream-copied
 */
export function defaultOutput(): OutputJobConfig {
  return {
    video: createVideoConfig('x264'),
    outputExtension: DEFAULT_OUTPUT_EXTENSION,
    audio: {
      encoder: 'copy',
      kbpsPerChannel: DEFAULT_AUDIO_KBPS_PER_CHANNEL,
    },
    audioNormalize: false,
    audioTracks: [],
    subtitleTracks: [],
  };
}

/**
 * First video encoder named in the stream; later ones are ignored
 */
export function findVideoEncoder(tokens: readonly FilterToken[]): VideoEncoderName | undefined {
  for (const token of tokens) {
    if (token.type === 'videoEncoder') {
      return token.name;
    }
  }
  return undefined;
}

function assertInRange(filter: string, value: number, min: number, max: number): void {
  if (value < min || value > max) {
    throw new FilterValueOutOfRangeError(filter, value, { min, max });
  }
}

function applyQuantizer(video: VideoJobConfig, value: number): void {
  if (video.encoder === 'copy') {
    return;
  }
  const range = VIDEO_ENCODER_INFO[video.encoder].quantizerRange;
  if (range !== undefined) {
    assertInRange('q', value, range.min, range.max);
  }
  video.crf = value;
}

function applySpeed(video: VideoJobConfig, value: number): void {
  switch (video.encoder) {
    case 'aom':
    case 'rav1e':
    case 'svt':
      assertInRange('s', value, SPEED_RANGE.min, SPEED_RANGE.max);
      video.speed = value;
      break;
    case 'x264':
    case 'x265':
    case 'copy':
      break;
  }
}

function applyProfile(video: VideoJobConfig, profile: Profile): void {
  switch (video.encoder) {
    case 'aom':
    case 'rav1e':
    case 'svt':
    case 'x264':
    case 'x265':
      video.profile = profile;
      break;
    case 'copy':
      break;
  }
}

function applyGrain(video: VideoJobConfig, value: number): void {
  switch (video.encoder) {
    case 'aom':
    case 'rav1e':
    case 'svt':
      assertInRange('grain', value, GRAIN_RANGE.min, GRAIN_RANGE.max);
      video.grain = value;
      break;
    case 'x264':
    case 'x265':
    case 'copy':
      break;
  }
}

function applyCompat(video: VideoJobConfig, enabled: boolean): void {
  switch (video.encoder) {
    case 'aom':
    case 'x264':
    case 'x265':
      video.compat = enabled;
      break;
    case 'rav1e':
    case 'svt':
    case 'copy':
      break;
  }
}

/**
 * Project one filter onto the configuration
 */
export function applyFilter(token: FilterToken, output: OutputJobConfig): void {
  switch (token.type) {
    case 'videoEncoder':
      // Chosen before folding
      break;
    case 'quantizer':
      applyQuantizer(output.video, token.value);
      break;
    case 'speed':
      applySpeed(output.video, token.value);
      break;
    case 'profile':
      applyProfile(output.video, token.profile);
      break;
    case 'grain':
      applyGrain(output.video, token.value);
      break;
    case 'compat':
      applyCompat(output.video, token.enabled);
      break;
    case 'extension':
      output.outputExtension = token.extension;
      break;
    case 'bitDepth':
      output.bitDepthOverride = token.bitDepth;
      break;
    case 'resolution':
      output.resolutionOverride = { width: token.width, height: token.height };
      break;
    case 'audioEncoder':
      output.audio.encoder = token.name;
      break;
    case 'audioBitrate':
      if (token.kbpsPerChannel < AUDIO_BITRATE_RANGE.min) {
        throw new InvalidAudioBitrateError(token.kbpsPerChannel, AUDIO_BITRATE_RANGE);
      }
      output.audio.kbpsPerChannel = token.kbpsPerChannel;
      break;
    case 'audioTracks':
      output.audioTracks = [...token.tracks];
      break;
    case 'audioNormalize':
      output.audioNormalize = true;
      break;
    case 'subtitleTracks':
      output.subtitleTracks = [...token.tracks];
      break;
    default: {
      const unhandled: never = token;
      throw new Error(`Unhandled filter: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Resolve the tokens of one segment into a validated configuration
 */
export function resolveOutput(tokens: readonly FilterToken[]): OutputJobConfig {
  const output = defaultOutput();

  const encoder = findVideoEncoder(tokens);
  if (encoder !== undefined) {
    output.video = createVideoConfig(encoder);
  }

  for (const token of tokens) {
    applyFilter(token, output);
  }

  return output;
}
