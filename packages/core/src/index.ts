/**
 * @encode-spec/core
 * 
 * Core package containing the error taxonomy shared by the
 * specification parser, the resolver and the CLI.
 */

// Errors
export {
  EncodeSpecError,
  ParseError,
  UnrecognizedFilterError,
  UnknownEncoderNameError,
  UnknownAudioEncoderNameError,
  UnknownProfileError,
  UnsupportedExtensionError,
  UnsupportedBitDepthError,
  InvalidNumericLiteralError,
  FilterValueOutOfRangeError,
  InvalidAudioBitrateError,
  MissingTrackFileError,
  isParseError,
  type ValueRange,
} from './errors/index.js';
