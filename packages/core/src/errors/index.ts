/**
 * Custom Error Classes
 */

/**
 * Inclusive numeric bound a filter value must fall within
 */
export interface ValueRange {
  min: number;
  max: number;
}

/**
 * Base error class for all encode-spec errors
 */
export class EncodeSpecError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EncodeSpecError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Base class for every failure raised while parsing or resolving a
 * specification string. A parse error is terminal for the whole string.
 */
export class ParseError extends EncodeSpecError {
  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
    this.name = 'ParseError';
  }
}

/**
 * No filter production matched at the current position
 */
export class UnrecognizedFilterError extends ParseError {
  public readonly remainder: string;

  constructor(remainder: string) {
    super(
      `Unrecognized filter: ${remainder}`,
      'UNRECOGNIZED_FILTER',
      { remainder }
    );
    this.name = 'UnrecognizedFilterError';
    this.remainder = remainder;
  }
}

export class UnknownEncoderNameError extends ParseError {
  public readonly encoderName: string;

  constructor(name: string, supported: readonly string[]) {
    super(
      `Unrecognized video encoder: ${name}`,
      'UNKNOWN_ENCODER_NAME',
      { name, supported: [...supported] }
    );
    this.name = 'UnknownEncoderNameError';
    this.encoderName = name;
  }
}

export class UnknownAudioEncoderNameError extends ParseError {
  public readonly encoderName: string;

  constructor(name: string, supported: readonly string[]) {
    super(
      `Unrecognized audio encoder: ${name}`,
      'UNKNOWN_AUDIO_ENCODER_NAME',
      { name, supported: [...supported] }
    );
    this.name = 'UnknownAudioEncoderNameError';
    this.encoderName = name;
  }
}

export class UnknownProfileError extends ParseError {
  public readonly profileName: string;

  constructor(name: string, supported: readonly string[]) {
    super(
      `Unrecognized profile: ${name}`,
      'UNKNOWN_PROFILE',
      { name, supported: [...supported] }
    );
    this.name = 'UnknownProfileError';
    this.profileName = name;
  }
}

export class UnsupportedExtensionError extends ParseError {
  public readonly extension: string;

  constructor(extension: string, supported: readonly string[]) {
    super(
      `Unsupported extension: ${extension}`,
      'UNSUPPORTED_EXTENSION',
      { extension, supported: [...supported] }
    );
    this.name = 'UnsupportedExtensionError';
    this.extension = extension;
  }
}

export class UnsupportedBitDepthError extends ParseError {
  public readonly bitDepth: string;

  constructor(bitDepth: string, supported: readonly number[]) {
    super(
      `Unsupported bit depth: ${bitDepth}`,
      'UNSUPPORTED_BIT_DEPTH',
      { bitDepth, supported: [...supported] }
    );
    this.name = 'UnsupportedBitDepthError';
    this.bitDepth = bitDepth;
  }
}

/**
 * A numeric clause whose value is missing, malformed, or does not fit the
 * integer type of its filter
 */
export class InvalidNumericLiteralError extends ParseError {
  public readonly filter: string;
  public readonly literal: string;

  constructor(filter: string, literal: string) {
    super(
      `Invalid numeric value for '${filter}': ${literal === '' ? '(empty)' : literal}`,
      'INVALID_NUMERIC_LITERAL',
      { filter, literal }
    );
    this.name = 'InvalidNumericLiteralError';
    this.filter = filter;
    this.literal = literal;
  }
}

export class FilterValueOutOfRangeError extends ParseError {
  public readonly filter: string;
  public readonly value: number;
  public readonly allowedRange: ValueRange;

  constructor(filter: string, value: number, allowedRange: ValueRange, message?: string) {
    super(
      message ?? `'${filter}' must be between ${allowedRange.min} and ${allowedRange.max}, received ${value}`,
      'FILTER_VALUE_OUT_OF_RANGE',
      { filter, value, allowedRange: { ...allowedRange } }
    );
    this.name = 'FilterValueOutOfRangeError';
    this.filter = filter;
    this.value = value;
    this.allowedRange = allowedRange;
  }
}

/**
 * Audio bitrate of zero kbps per channel
 */
export class InvalidAudioBitrateError extends FilterValueOutOfRangeError {
  constructor(value: number, allowedRange: ValueRange) {
    super('ab', value, allowedRange, `'ab' must be greater than 0, got ${value}`);
    this.name = 'InvalidAudioBitrateError';
  }
}

/**
 * An external track alias whose sibling file does not exist
 */
export class MissingTrackFileError extends ParseError {
  public readonly path: string;
  public readonly identifier: string;

  constructor(identifier: string, path: string) {
    super(
      `Track file not found for '${identifier}': ${path}`,
      'MISSING_TRACK_FILE',
      { identifier, path }
    );
    this.name = 'MissingTrackFileError';
    this.path = path;
    this.identifier = identifier;
  }
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}
