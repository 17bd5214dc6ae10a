import { describe, it, expect } from 'vitest';
import { FilterValueOutOfRangeError, InvalidAudioBitrateError } from '@encode-spec/core';
import type { FileSystem } from '@encode-spec/utils';
import { parseFilters } from '../parser.js';
import { defaultOutput, findVideoEncoder, resolveOutput } from '../resolver.js';
import type { OutputJobConfig } from '../types.js';

const fileSystem: FileSystem = { exists: (filePath) => filePath === 'movie.ac3' };

function resolve(segment: string): OutputJobConfig {
  return resolveOutput(parseFilters(segment, 'movie.vpy', { fileSystem }));
}

describe('defaultOutput', () => {
  it('is x264 at crf 18 in Matroska with copied audio', () => {
    expect(defaultOutput()).toEqual({
      video: { encoder: 'x264', crf: 18, profile: 'film', compat: false },
      outputExtension: 'mkv',
      audio: { encoder: 'copy', kbpsPerChannel: 80 },
      audioNormalize: false,
      audioTracks: [],
      subtitleTracks: [],
    });
  });

  it('returns a fresh object on each call', () => {
    const first = defaultOutput();
    first.audioTracks.push({ source: { kind: 'video', index: 1 }, enabled: true, forced: false });

    expect(defaultOutput().audioTracks).toEqual([]);
  });
});

describe('resolveOutput', () => {
  it('resolves an empty token stream to the default', () => {
    expect(resolveOutput([])).toEqual(defaultOutput());
  });

  it('initializes each encoder with its defaults', () => {
    expect(resolve('enc=x264').video).toEqual({ encoder: 'x264', crf: 18, profile: 'film', compat: false });
    expect(resolve('enc=x265').video).toEqual({ encoder: 'x265', crf: 18, profile: 'film', compat: false });
    expect(resolve('enc=aom').video).toEqual({
      encoder: 'aom', crf: 16, speed: 4, profile: 'film', grain: 0, compat: false,
    });
    expect(resolve('enc=svt').video).toEqual({ encoder: 'svt', crf: 16, speed: 4, profile: 'film', grain: 0 });
    expect(resolve('enc=rav1e').video).toEqual({ encoder: 'rav1e', crf: 40, speed: 5, profile: 'film', grain: 0 });
    expect(resolve('enc=copy').video).toEqual({ encoder: 'copy' });
  });

  it('picks the encoder before applying filters that precede it', () => {
    expect(resolve('q=30,enc=aom').video).toEqual({
      encoder: 'aom', crf: 30, speed: 4, profile: 'film', grain: 0, compat: false,
    });
  });

  it('keeps the first encoder when several are given', () => {
    expect(findVideoEncoder(parseFilters('enc=x265,enc=aom', 'movie.vpy'))).toBe('x265');
    expect(resolve('enc=x265,q=20,enc=aom').video).toEqual({
      encoder: 'x265', crf: 20, profile: 'film', compat: false,
    });
  });

  it('yields the same result regardless of independent filter order', () => {
    expect(resolve('enc=svt,q=20,p=anime')).toEqual(resolve('enc=svt,p=anime,q=20'));
    expect(resolve('q=20,p=anime').video).toEqual({ encoder: 'x264', crf: 20, profile: 'anime', compat: false });
  });

  it('lets later clauses overwrite earlier ones', () => {
    const output = resolve('q=20,q=22,ext=mp4,ext=mkv,at=1,at=2');

    expect(output.video).toEqual({ encoder: 'x264', crf: 22, profile: 'film', compat: false });
    expect(output.outputExtension).toBe('mkv');
    expect(output.audioTracks).toEqual([
      { source: { kind: 'video', index: 2 }, enabled: false, forced: false },
    ]);
  });

  describe('quantizer ranges', () => {
    it('accepts the bounds of each encoder', () => {
      expect(resolve('enc=x264,q=-12').video).toMatchObject({ crf: -12 });
      expect(resolve('enc=x264,q=51').video).toMatchObject({ crf: 51 });
      expect(resolve('enc=x265,q=0').video).toMatchObject({ crf: 0 });
      expect(resolve('enc=aom,q=63').video).toMatchObject({ crf: 63 });
      expect(resolve('enc=svt,q=63').video).toMatchObject({ crf: 63 });
      expect(resolve('enc=rav1e,q=255').video).toMatchObject({ crf: 255 });
    });

    it('rejects values outside the encoder range', () => {
      expect(() => resolve('enc=x264,q=60')).toThrow(FilterValueOutOfRangeError);
      expect(() => resolve('enc=x264,q=60')).toThrow("'q' must be between -12 and 51, received 60");
      expect(() => resolve('enc=x265,q=-1')).toThrow("'q' must be between 0 and 51, received -1");
      expect(() => resolve('enc=aom,q=64')).toThrow(FilterValueOutOfRangeError);
      expect(() => resolve('enc=rav1e,q=256')).toThrow(FilterValueOutOfRangeError);
    });

    it('carries the allowed range on the error', () => {
      try {
        resolve('enc=svt,q=70');
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(FilterValueOutOfRangeError);
        if (error instanceof FilterValueOutOfRangeError) {
          expect(error.filter).toBe('q');
          expect(error.value).toBe(70);
          expect(error.allowedRange).toEqual({ min: 0, max: 63 });
        }
      }
    });
  });

  it('bounds speed for AV1 encoders only', () => {
    expect(resolve('enc=rav1e,s=10').video).toMatchObject({ speed: 10 });
    expect(() => resolve('enc=rav1e,s=11')).toThrow("'s' must be between 0 and 10, received 11");
    expect(() => resolve('enc=aom,speed=11')).toThrow(FilterValueOutOfRangeError);
    expect(resolve('enc=x264,s=11').video).toEqual({ encoder: 'x264', crf: 18, profile: 'film', compat: false });
  });

  it('bounds grain at 64 for AV1 encoders only', () => {
    expect(resolve('enc=svt,grain=64').video).toMatchObject({ grain: 64 });
    expect(() => resolve('enc=svt,grain=65')).toThrow("'grain' must be between 0 and 64, received 65");
    expect(resolve('enc=x265,g=200').video).toEqual({ encoder: 'x265', crf: 18, profile: 'film', compat: false });
  });

  it('applies compat to x264, x265 and aom only', () => {
    expect(resolve('enc=aom,compat=1').video).toMatchObject({ compat: true });
    expect(resolve('enc=x265,compat=2').video).toMatchObject({ compat: true });
    expect(resolve('enc=rav1e,compat=1').video).toEqual({
      encoder: 'rav1e', crf: 40, speed: 5, profile: 'film', grain: 0,
    });
  });

  it('ignores every video filter for stream copy', () => {
    expect(resolve('enc=copy,q=999,s=50,p=anime,grain=100,compat=1').video).toEqual({ encoder: 'copy' });
  });

  it('applies container, picture and audio filters to any encoder', () => {
    const output = resolve('enc=copy,ext=mp4,bd=8,res=1280x720,aenc=opus,ab=64,an=1,at=0-e|ac3-f,st=2-f');

    expect(output).toEqual({
      video: { encoder: 'copy' },
      outputExtension: 'mp4',
      bitDepthOverride: 8,
      resolutionOverride: { width: 1280, height: 720 },
      audio: { encoder: 'opus', kbpsPerChannel: 64 },
      audioNormalize: true,
      audioTracks: [
        { source: { kind: 'video', index: 0 }, enabled: true, forced: false },
        { source: { kind: 'external', path: 'movie.ac3' }, enabled: false, forced: true },
      ],
      subtitleTracks: [
        { source: { kind: 'video', index: 2 }, enabled: false, forced: true },
      ],
    });
  });

  it('rejects a zero audio bitrate', () => {
    expect(() => resolve('aenc=opus,ab=0')).toThrow(InvalidAudioBitrateError);
    expect(() => resolve('ab=0')).toThrow(FilterValueOutOfRangeError);
  });
});
