/**
 * Job Specification Types
 */

import type {
  AUDIO_ENCODERS,
  BIT_DEPTHS,
  OUTPUT_EXTENSIONS,
  PROFILES,
  VIDEO_ENCODERS,
} from './constants.js';

export type VideoEncoderName = typeof VIDEO_ENCODERS[number];
export type AudioEncoderName = typeof AUDIO_ENCODERS[number];
export type Profile = typeof PROFILES[number];
export type OutputExtension = typeof OUTPUT_EXTENSIONS[number];
export type BitDepth = typeof BIT_DEPTHS[number];

export interface Resolution {
  width: number;
  height: number;
}

// ============================================
// TRACKS
// ============================================

/**
 * Where a muxed track comes from: a stream of the video source itself, or a
 * sibling file next to the specification file
 */
export type TrackSource =
  | { kind: 'video'; index: number }
  | { kind: 'external'; path: string; trackIndex?: number };

export interface TrackSpec {
  source: TrackSource;
  enabled: boolean;
  forced: boolean;
}

// ============================================
// VIDEO
// ============================================

export interface CopyVideoConfig {
  encoder: 'copy';
}

export interface AomVideoConfig {
  encoder: 'aom';
  crf: number;
  speed: number;
  profile: Profile;
  grain: number;
  compat: boolean;
}

export interface Rav1eVideoConfig {
  encoder: 'rav1e';
  crf: number;
  speed: number;
  profile: Profile;
  grain: number;
}

export interface SvtAv1VideoConfig {
  encoder: 'svt';
  crf: number;
  speed: number;
  profile: Profile;
  grain: number;
}

export interface X264VideoConfig {
  encoder: 'x264';
  crf: number;
  profile: Profile;
  compat: boolean;
}

export interface X265VideoConfig {
  encoder: 'x265';
  crf: number;
  profile: Profile;
  compat: boolean;
}

export type VideoJobConfig =
  | CopyVideoConfig
  | AomVideoConfig
  | Rav1eVideoConfig
  | SvtAv1VideoConfig
  | X264VideoConfig
  | X265VideoConfig;

// ============================================
// OUTPUT
// ============================================

export interface AudioJobConfig {
  encoder: AudioEncoderName;
  kbpsPerChannel: number;
}

export interface OutputJobConfig {
  video: VideoJobConfig;
  outputExtension: OutputExtension;
  bitDepthOverride?: BitDepth;
  resolutionOverride?: Resolution;
  audio: AudioJobConfig;
  audioNormalize: boolean;
  audioTracks: TrackSpec[];
  subtitleTracks: TrackSpec[];
}

// ============================================
// FILTER TOKENS
// ============================================

export type FilterToken =
  | { type: 'videoEncoder'; name: VideoEncoderName }
  | { type: 'quantizer'; value: number }
  | { type: 'speed'; value: number }
  | { type: 'profile'; profile: Profile }
  | { type: 'grain'; value: number }
  | { type: 'compat'; enabled: boolean }
  | { type: 'extension'; extension: OutputExtension }
  | { type: 'bitDepth'; bitDepth: BitDepth }
  | { type: 'resolution'; width: number; height: number }
  | { type: 'audioEncoder'; name: AudioEncoderName }
  | { type: 'audioBitrate'; kbpsPerChannel: number }
  | { type: 'audioTracks'; tracks: TrackSpec[] }
  | { type: 'audioNormalize' }
  | { type: 'subtitleTracks'; tracks: TrackSpec[] };

