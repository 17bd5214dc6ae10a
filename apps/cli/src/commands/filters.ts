/**
 * Filters Command
 * 
 * Show the clauses a specification segment can contain.
 */

import chalk from 'chalk';
import { PROFILES, listFilters } from '@encode-spec/jobspec';
import { printHeader } from '../lib/output.js';

const filterDescriptions: Record<string, string> = {
  enc: 'Video encoder',
  q: 'Quantizer / CRF (range depends on the encoder)',
  s: 'Encoder speed, 0-10 (AV1 encoders)',
  p: 'Tuning profile',
  grain: 'Film grain synthesis strength, 0-64 (AV1 encoders)',
  compat: 'Device compatibility mode, 0 or 1 (x264, x265, aom)',
  ext: 'Output container: mkv or mp4',
  bd: 'Output bit depth: 8 or 10',
  res: 'Output resolution WxH, even and at least 64',
  aenc: 'Audio encoder',
  ab: 'Audio bitrate in kbps per channel',
  at: 'Audio tracks: id[-def]|id[-def]...',
  an: 'Normalize audio (an=1)',
  st: 'Subtitle tracks: id[-def]|id[-def]...',
};

export function filtersCommand(): void {
  printHeader('Specification Filters');

  for (const { filter, keys } of listFilters()) {
    console.log(`  ${chalk.cyan(keys.join(' '))}`);
    console.log(`    ${filterDescriptions[filter] ?? filter}`);
  }

  console.log();
  console.log(chalk.bold('Profiles:'), PROFILES.join(', '));
  console.log(chalk.bold('Track tags:'), 'd/e = default (enabled), f = forced');
  console.log(chalk.bold('Track ids:'), 'N = stream of the source, ext = <source>.ext, N.ext = track N of <source>.ext');
  console.log();
  console.log(chalk.gray('Separate clauses with "," and outputs with ";", e.g.'));
  console.log(chalk.gray('  enc=x264,q=18;enc=aom,q=16,s=4,p=anime,aenc=opus,ab=64'));
}
