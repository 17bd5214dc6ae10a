/**
 * Filter Parser
 *
 * Tokenizes one output segment of a specification string into typed
 * filter tokens. Each clause is `key=value`; productions are tried in a
 * fixed order and the first one whose key matches consumes the clause.
 *
 * Examples:
 * - enc=aom,q=20,s=4,p=anime,grain=12
 * - enc=x264,crf=16,res=1280x720,bd=8,ext=mp4
 * - aenc=opus,ab=64,an=1,at=0-e|1-f,st=eng.srt-d
 */

import {
  FilterValueOutOfRangeError,
  InvalidNumericLiteralError,
  UnknownAudioEncoderNameError,
  UnknownEncoderNameError,
  UnknownProfileError,
  UnrecognizedFilterError,
  UnsupportedBitDepthError,
  UnsupportedExtensionError,
  type ValueRange,
} from '@encode-spec/core';
import { isOneOf, nodeFileSystem, type FileSystem } from '@encode-spec/utils';
import {
  AUDIO_ENCODERS,
  BIT_DEPTHS,
  I16_RANGE,
  MIN_RESOLUTION,
  OUTPUT_EXTENSIONS,
  PROFILES,
  RESOLUTION_RANGE,
  U32_MAX,
  U8_MAX,
  VIDEO_ENCODERS,
} from './constants.js';
import { isAudioEncoderName, isVideoEncoderName, parseProfile } from './encoders.js';
import { resolveTrackSource } from './tracks.js';
import type { FilterToken, TrackSpec } from './types.js';

export interface ParseOptions {
  /**
   * Used to check that external track files exist. Defaults to node:fs.
   */
  fileSystem?: FileSystem;
}

interface ParseContext {
  sourceFile: string;
  fileSystem: FileSystem;
}

export interface ParsedFilter {
  token: FilterToken;
  rest: string;
}

interface FilterProduction {
  // Canonical filter name used in errors
  filter: string;
  keys: readonly string[];
  parse(value: string, key: string, context: ParseContext): ParsedFilter;
}

// Value grammars
const PATTERNS = {
  alphanumeric: /^[A-Za-z0-9]+/,
  alpha: /^[A-Za-z]+/,
  digits: /^\d+/,
  signedDigits: /^-?\d+/,
  resolution: /^(\d+)x(\d+)/,
  trackClause: /^([A-Za-z0-9]+(?:\.[A-Za-z0-9]+)*)(?:-([A-Za-z]+))?/,
  tagLetters: /^[def]+$/,
  // What an error reports as the value when the grammar does not match
  rawValue: /^[^,;|\s]*/,
  // Commas and whitespace between clauses
  separators: /^[\s,]+/,
};

const U8_RANGE: ValueRange = { min: 0, max: U8_MAX };
const U32_RANGE: ValueRange = { min: 0, max: U32_MAX };

function matchValue(pattern: RegExp, input: string): string | undefined {
  return pattern.exec(input)?.[0];
}

function rawValue(input: string): string {
  return matchValue(PATTERNS.rawValue, input) ?? '';
}

/**
 * Parse a decimal literal that must fit the integer type of its filter
 */
function parseIntegerLiteral(filter: string, literal: string, range: ValueRange): number {
  const value = Number.parseInt(literal, 10);
  if (!Number.isSafeInteger(value) || value < range.min || value > range.max) {
    throw new InvalidNumericLiteralError(filter, literal);
  }
  // "-0" parses to negative zero
  return value === 0 ? 0 : value;
}

/**
 * Read an unsigned or signed integer value at the start of `value`
 */
function readInteger(
  filter: string,
  value: string,
  range: ValueRange,
  signed = false
): { parsed: number; rest: string } {
  const literal = matchValue(signed ? PATTERNS.signedDigits : PATTERNS.digits, value);
  if (literal === undefined) {
    throw new InvalidNumericLiteralError(filter, rawValue(value));
  }
  return {
    parsed: parseIntegerLiteral(filter, literal, range),
    rest: value.slice(literal.length),
  };
}

/**
 * Parse `clause ('|' clause)*` where a clause is `identifier ('-' tags)?`
 */
function parseTrackList(
  key: string,
  value: string,
  context: ParseContext
): { tracks: TrackSpec[]; rest: string } {
  const tracks: TrackSpec[] = [];
  let rest = value;

  for (;;) {
    const match = PATTERNS.trackClause.exec(rest);
    const identifier = match?.[1];
    if (identifier === undefined) {
      throw new UnrecognizedFilterError(key + value);
    }

    const tags = match?.[2] ?? '';
    if (tags !== '' && !PATTERNS.tagLetters.test(tags)) {
      throw new UnrecognizedFilterError(key + value);
    }

    tracks.push({
      source: resolveTrackSource(identifier, context.sourceFile, context.fileSystem),
      enabled: tags.includes('d') || tags.includes('e'),
      forced: tags.includes('f'),
    });

    rest = rest.slice(identifier.length + (tags === '' ? 0 : tags.length + 1));
    if (!rest.startsWith('|')) {
      return { tracks, rest };
    }
    rest = rest.slice(1);
  }
}

// ============================================
// PRODUCTIONS (in priority order)
// ============================================

const PRODUCTIONS: readonly FilterProduction[] = [
  {
    filter: 'enc',
    keys: ['enc='],
    parse(value) {
      const name = matchValue(PATTERNS.alphanumeric, value) ?? rawValue(value);
      if (!isVideoEncoderName(name)) {
        throw new UnknownEncoderNameError(name, VIDEO_ENCODERS);
      }
      return { token: { type: 'videoEncoder', name }, rest: value.slice(name.length) };
    },
  },
  {
    filter: 'q',
    keys: ['q=', 'qp=', 'crf='],
    parse(value) {
      const { parsed, rest } = readInteger('q', value, I16_RANGE, true);
      return { token: { type: 'quantizer', value: parsed }, rest };
    },
  },
  {
    filter: 's',
    keys: ['s=', 'speed='],
    parse(value) {
      const { parsed, rest } = readInteger('s', value, U8_RANGE);
      return { token: { type: 'speed', value: parsed }, rest };
    },
  },
  {
    filter: 'p',
    keys: ['p=', 'profile='],
    parse(value) {
      const name = matchValue(PATTERNS.alpha, value) ?? rawValue(value);
      const profile = parseProfile(name);
      if (profile === undefined) {
        throw new UnknownProfileError(name, PROFILES);
      }
      return { token: { type: 'profile', profile }, rest: value.slice(name.length) };
    },
  },
  {
    filter: 'grain',
    keys: ['g=', 'grain='],
    parse(value) {
      const { parsed, rest } = readInteger('grain', value, U8_RANGE);
      return { token: { type: 'grain', value: parsed }, rest };
    },
  },
  {
    filter: 'compat',
    keys: ['compat='],
    parse(value) {
      const { parsed, rest } = readInteger('compat', value, U8_RANGE);
      return { token: { type: 'compat', enabled: parsed > 0 }, rest };
    },
  },
  {
    filter: 'ext',
    keys: ['ext='],
    parse(value) {
      const extension = matchValue(PATTERNS.alphanumeric, value) ?? rawValue(value);
      if (!isOneOf(OUTPUT_EXTENSIONS, extension)) {
        throw new UnsupportedExtensionError(extension, OUTPUT_EXTENSIONS);
      }
      return { token: { type: 'extension', extension }, rest: value.slice(extension.length) };
    },
  },
  {
    filter: 'bd',
    keys: ['bd='],
    parse(value) {
      const literal = matchValue(PATTERNS.digits, value);
      const bitDepth = literal === '8' ? 8 : literal === '10' ? 10 : undefined;
      if (literal === undefined || bitDepth === undefined) {
        throw new UnsupportedBitDepthError(literal ?? rawValue(value), BIT_DEPTHS);
      }
      return { token: { type: 'bitDepth', bitDepth }, rest: value.slice(literal.length) };
    },
  },
  {
    filter: 'res',
    keys: ['res='],
    parse(value) {
      const match = PATTERNS.resolution.exec(value);
      const widthLiteral = match?.[1];
      const heightLiteral = match?.[2];
      if (widthLiteral === undefined || heightLiteral === undefined) {
        throw new InvalidNumericLiteralError('res', rawValue(value));
      }

      const width = parseIntegerLiteral('res', widthLiteral, U32_RANGE);
      const height = parseIntegerLiteral('res', heightLiteral, U32_RANGE);
      const shown = `${widthLiteral}x${heightLiteral}`;
      if (width % 2 !== 0 || height % 2 !== 0) {
        throw new FilterValueOutOfRangeError(
          'res',
          width % 2 !== 0 ? width : height,
          RESOLUTION_RANGE,
          `Resolution must be mod 2, got ${shown}`
        );
      }
      if (width < MIN_RESOLUTION || height < MIN_RESOLUTION) {
        throw new FilterValueOutOfRangeError(
          'res',
          Math.min(width, height),
          RESOLUTION_RANGE,
          `Resolution must be at least ${MIN_RESOLUTION}x${MIN_RESOLUTION}, got ${shown}`
        );
      }

      return {
        token: { type: 'resolution', width, height },
        rest: value.slice(shown.length),
      };
    },
  },
  {
    filter: 'aenc',
    keys: ['aenc='],
    parse(value) {
      const name = matchValue(PATTERNS.alphanumeric, value) ?? rawValue(value);
      if (!isAudioEncoderName(name)) {
        throw new UnknownAudioEncoderNameError(name, AUDIO_ENCODERS);
      }
      return { token: { type: 'audioEncoder', name }, rest: value.slice(name.length) };
    },
  },
  {
    filter: 'ab',
    keys: ['ab='],
    parse(value) {
      const { parsed, rest } = readInteger('ab', value, U32_RANGE);
      return { token: { type: 'audioBitrate', kbpsPerChannel: parsed }, rest };
    },
  },
  {
    filter: 'at',
    keys: ['at='],
    parse(value, key, context) {
      const { tracks, rest } = parseTrackList(key, value, context);
      return { token: { type: 'audioTracks', tracks }, rest };
    },
  },
  {
    filter: 'an',
    keys: ['an=1'],
    parse(value) {
      return { token: { type: 'audioNormalize' }, rest: value };
    },
  },
  {
    filter: 'st',
    keys: ['st='],
    parse(value, key, context) {
      const { tracks, rest } = parseTrackList(key, value, context);
      return { token: { type: 'subtitleTracks', tracks }, rest };
    },
  },
];

/**
 * Parse the single clause at the start of `input`.
 *
 * Returns the token and the unconsumed tail, exactly as it follows the
 * clause (separators included).
 */
export function parseFilter(
  input: string,
  sourceFile: string,
  options: ParseOptions = {}
): ParsedFilter {
  const context: ParseContext = {
    sourceFile,
    fileSystem: options.fileSystem ?? nodeFileSystem,
  };

  for (const production of PRODUCTIONS) {
    const key = production.keys.find((candidate) => input.startsWith(candidate));
    if (key !== undefined) {
      return production.parse(input.slice(key.length), key, context);
    }
  }

  throw new UnrecognizedFilterError(input);
}

/**
 * Parse every clause of one output segment, in order.
 *
 * Clauses are separated by commas and/or whitespace. `sourceFile` is the
 * file the specification is attached to; external track aliases are
 * resolved next to it.
 */
export function parseFilters(
  segment: string,
  sourceFile: string,
  options: ParseOptions = {}
): FilterToken[] {
  const tokens: FilterToken[] = [];
  let input = segment.replace(PATTERNS.separators, '');

  while (input.length > 0) {
    const { token, rest } = parseFilter(input, sourceFile, options);
    tokens.push(token);
    input = rest.replace(PATTERNS.separators, '');
  }

  return tokens;
}

/**
 * Every filter the parser understands with its accepted keys, in
 * priority order
 */
export function listFilters(): Array<{ filter: string; keys: string[] }> {
  return PRODUCTIONS.map((production) => ({
    filter: production.filter,
    keys: [...production.keys],
  }));
}
