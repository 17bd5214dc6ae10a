/**
 * Encoders Command
 * 
 * List supported encoders with their defaults and quantizer ranges.
 */

import chalk from 'chalk';
import {
  AUDIO_ENCODER_DESCRIPTIONS,
  DEFAULT_AUDIO_KBPS_PER_CHANNEL,
  VIDEO_ENCODER_INFO,
  createVideoConfig,
  supportedAudioEncoders,
  supportedVideoEncoders,
} from '@encode-spec/jobspec';
import { printHeader, printJson } from '../lib/output.js';

interface EncodersOptions {
  json?: boolean;
}

export function encodersCommand(options: EncodersOptions): void {
  const video = supportedVideoEncoders().map((name) => ({
    ...VIDEO_ENCODER_INFO[name],
    defaults: createVideoConfig(name),
  }));
  const audio = supportedAudioEncoders().map((name) => ({
    name,
    description: AUDIO_ENCODER_DESCRIPTIONS[name],
  }));

  if (options.json) {
    printJson({ video, audio });
    return;
  }

  printHeader('Video Encoders');
  for (const encoder of video) {
    const range = encoder.quantizerRange
      ? `q ${encoder.quantizerRange.min}..${encoder.quantizerRange.max}`
      : 'no quantizer';
    console.log(`  ${chalk.cyan(encoder.name.padEnd(6))} ${encoder.description} ${chalk.gray(`(${range})`)}`);
    const defaults = Object.entries(encoder.defaults)
      .filter(([key]) => key !== 'encoder')
      .map(([key, value]) => `${key}=${String(value)}`);
    if (defaults.length > 0) {
      console.log(`         ${chalk.gray(defaults.join(' '))}`);
    }
  }

  printHeader('Audio Encoders');
  for (const encoder of audio) {
    console.log(`  ${chalk.cyan(encoder.name.padEnd(6))} ${encoder.description}`);
  }
  console.log();
  console.log(chalk.gray(`Default audio bitrate: ${DEFAULT_AUDIO_KBPS_PER_CHANNEL} kbps per channel`));
}
