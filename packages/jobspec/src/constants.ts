/**
 * Closed value sets and numeric bounds of the specification language
 */

import type { ValueRange } from '@encode-spec/core';

export const VIDEO_ENCODERS = ['aom', 'rav1e', 'svt', 'x264', 'x265', 'copy'] as const;

export const AUDIO_ENCODERS = ['copy', 'aac', 'flac', 'opus'] as const;

export const PROFILES = [
  'film',
  'grain',
  'anime',
  'animedetailed',
  'animegrain',
  'fast',
] as const;

export const OUTPUT_EXTENSIONS = ['mp4', 'mkv'] as const;

export const BIT_DEPTHS = [8, 10] as const;

export const U8_MAX = 255;
export const U32_MAX = 4294967295;
export const I16_RANGE: ValueRange = { min: -32768, max: 32767 };

export const SPEED_RANGE: ValueRange = { min: 0, max: 10 };

export const GRAIN_RANGE: ValueRange = { min: 0, max: 64 };

export const MIN_RESOLUTION = 64;
export const RESOLUTION_RANGE: ValueRange = { min: MIN_RESOLUTION, max: U32_MAX };

export const AUDIO_BITRATE_RANGE: ValueRange = { min: 1, max: U32_MAX };

export const DEFAULT_OUTPUT_EXTENSION = 'mkv';
export const DEFAULT_AUDIO_KBPS_PER_CHANNEL = 80;
