/**
 * Encoder Catalog
 * 
 * Static description of every supported video and audio encoder:
 * quantizer ranges, backend names and default settings.
 */

import type { ValueRange } from '@encode-spec/core';
import { isOneOf } from '@encode-spec/utils';
import {
  AUDIO_ENCODERS,
  PROFILES,
  VIDEO_ENCODERS,
} from './constants.js';
import type {
  AudioEncoderName,
  Profile,
  VideoEncoderName,
  VideoJobConfig,
} from './types.js';

export interface VideoEncoderInfo {
  name: VideoEncoderName;
  description: string;
  // Encoder name as understood by the chunked encoding front end
  backendName: string;
  quantizerRange?: ValueRange;
}

export const VIDEO_ENCODER_INFO: Record<VideoEncoderName, VideoEncoderInfo> = {
  aom: {
    name: 'aom',
    description: 'AV1 (libaom)',
    backendName: 'aom',
    quantizerRange: { min: 0, max: 63 },
  },
  rav1e: {
    name: 'rav1e',
    description: 'AV1 (rav1e)',
    backendName: 'rav1e',
    quantizerRange: { min: 0, max: 255 },
  },
  svt: {
    name: 'svt',
    description: 'AV1 (SVT-AV1)',
    backendName: 'svt-av1',
    quantizerRange: { min: 0, max: 63 },
  },
  x264: {
    name: 'x264',
    description: 'H.264 (x264)',
    backendName: 'x264',
    quantizerRange: { min: -12, max: 51 },
  },
  x265: {
    name: 'x265',
    description: 'HEVC (x265)',
    backendName: 'x265',
    quantizerRange: { min: 0, max: 51 },
  },
  copy: {
    name: 'copy',
    description: 'Stream copy, no re-encode',
    backendName: 'copy',
  },
};

export const AUDIO_ENCODER_DESCRIPTIONS: Record<AudioEncoderName, string> = {
  copy: 'Stream copy, no re-encode',
  aac: 'AAC',
  flac: 'FLAC (lossless)',
  opus: 'Opus',
};

export function supportedVideoEncoders(): readonly VideoEncoderName[] {
  return VIDEO_ENCODERS;
}

export function supportedAudioEncoders(): readonly AudioEncoderName[] {
  return AUDIO_ENCODERS;
}

export function isVideoEncoderName(value: string): value is VideoEncoderName {
  return isOneOf(VIDEO_ENCODERS, value);
}

export function isAudioEncoderName(value: string): value is AudioEncoderName {
  return isOneOf(AUDIO_ENCODERS, value);
}

/**
 * Parse a profile name, case-insensitively
 */
export function parseProfile(value: string): Profile | undefined {
  const normalized = value.toLowerCase();
  return isOneOf(PROFILES, normalized) ? normalized : undefined;
}

export function isAnimeProfile(profile: Profile): boolean {
  return profile === 'anime' || profile === 'animedetailed' || profile === 'animegrain';
}

/**
 * Build the default configuration of a video encoder
 */
export function createVideoConfig(encoder: VideoEncoderName): VideoJobConfig {
  switch (encoder) {
    case 'aom':
      return { encoder, crf: 16, speed: 4, profile: 'film', grain: 0, compat: false };
    case 'rav1e':
      return { encoder, crf: 40, speed: 5, profile: 'film', grain: 0 };
    case 'svt':
      return { encoder, crf: 16, speed: 4, profile: 'film', grain: 0 };
    case 'x264':
      return { encoder, crf: 18, profile: 'film', compat: false };
    case 'x265':
      return { encoder, crf: 18, profile: 'film', compat: false };
    case 'copy':
      return { encoder };
  }
}

export function getBackendName(video: VideoJobConfig): string {
  return VIDEO_ENCODER_INFO[video.encoder].backendName;
}

/**
 * AV1 encoders scale with per-worker thread pinning; the others do not
 */
export function usesThreadPinning(video: VideoJobConfig): boolean {
  return video.encoder === 'aom' || video.encoder === 'rav1e' || video.encoder === 'svt';
}
