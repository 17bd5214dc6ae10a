import { describe, it, expect } from 'vitest';
import { getBasename, withExtension } from '../path.js';

describe('path utilities', () => {
  it('replaces the extension of a bare filename', () => {
    expect(withExtension('movie.vpy', 'ac3')).toBe('movie.ac3');
  });

  it('keeps the directory of the original path', () => {
    expect(withExtension('/media/show/ep01.vpy', 'srt')).toBe('/media/show/ep01.srt');
  });

  it('accepts dotted extensions', () => {
    expect(withExtension('dir/movie.vpy', 'eng.srt')).toBe('dir/movie.eng.srt');
  });

  it('appends an extension when the path has none', () => {
    expect(withExtension('dir/movie', 'mkv')).toBe('dir/movie.mkv');
  });

  it('only replaces the last extension', () => {
    expect(withExtension('movie.part1.vpy', 'flac')).toBe('movie.part1.flac');
  });

  it('strips the directory and extension from basenames', () => {
    expect(getBasename('dir/Movie.MKV')).toBe('Movie');
  });
});
