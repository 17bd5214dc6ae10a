/**
 * @encode-spec/jobspec
 * 
 * The encode-job specification language:
 * - Filter parser (one segment -> filter tokens)
 * - Configuration resolver (tokens -> output job configuration)
 * - Multi-output splitter (specification string -> configurations)
 * - Track reference resolution
 * - Output naming
 */

// Types
export type {
  AudioEncoderName,
  AudioJobConfig,
  AomVideoConfig,
  BitDepth,
  CopyVideoConfig,
  FilterToken,
  OutputExtension,
  OutputJobConfig,
  Profile,
  Rav1eVideoConfig,
  Resolution,
  SvtAv1VideoConfig,
  TrackSource,
  TrackSpec,
  VideoEncoderName,
  VideoJobConfig,
  X264VideoConfig,
  X265VideoConfig,
} from './types.js';

// Constants
export {
  VIDEO_ENCODERS,
  AUDIO_ENCODERS,
  PROFILES,
  OUTPUT_EXTENSIONS,
  BIT_DEPTHS,
  SPEED_RANGE,
  GRAIN_RANGE,
  MIN_RESOLUTION,
  DEFAULT_OUTPUT_EXTENSION,
  DEFAULT_AUDIO_KBPS_PER_CHANNEL,
} from './constants.js';

// Encoder catalog
export {
  VIDEO_ENCODER_INFO,
  AUDIO_ENCODER_DESCRIPTIONS,
  supportedVideoEncoders,
  supportedAudioEncoders,
  isVideoEncoderName,
  isAudioEncoderName,
  parseProfile,
  isAnimeProfile,
  createVideoConfig,
  getBackendName,
  usesThreadPinning,
  type VideoEncoderInfo,
} from './encoders.js';

// Tracks
export { resolveTrackSource } from './tracks.js';

// Parser
export {
  parseFilter,
  parseFilters,
  listFilters,
  type ParseOptions,
  type ParsedFilter,
} from './parser.js';

// Resolver
export {
  defaultOutput,
  findVideoEncoder,
  applyFilter,
  resolveOutput,
} from './resolver.js';

// Splitter
export {
  resolveOutputs,
  tryResolveOutputs,
  splitSegments,
  type ResolveOptions,
  type ResolveResult,
} from './outputs.js';

// Naming
export {
  getOutputSuffix,
  buildOutputPath,
  isProcessedFile,
  describeOutput,
} from './naming.js';
