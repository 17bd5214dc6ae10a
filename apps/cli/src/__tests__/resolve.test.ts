import { afterEach, describe, expect, it, vi } from 'vitest';
import { resolveCommand } from '../commands/resolve.js';

describe('resolveCommand', () => {
  function captureConsole() {
    return {
      logSpy: vi.spyOn(console, 'log').mockImplementation(() => undefined),
      errorSpy: vi.spyOn(console, 'error').mockImplementation(() => undefined),
    };
  }

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints every output with its path as JSON', () => {
    const { logSpy } = captureConsole();
    resolveCommand('movie.mkv', 'enc=aom,q=16;enc=copy,ext=mp4', { json: true });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject([
      {
        path: 'movie.aom-q16.mkv',
        video: { encoder: 'aom', crf: 16, speed: 4 },
        outputExtension: 'mkv',
      },
      {
        path: 'movie.copy.mp4',
        video: { encoder: 'copy' },
        outputExtension: 'mp4',
      },
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('places outputs in the requested directory', () => {
    const { logSpy } = captureConsole();
    resolveCommand('/media/movie.mkv', 'enc=x265,q=20', { json: true, outputDir: '/encodes' });

    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject([{ path: '/encodes/movie.x265-q20.mkv' }]);
  });

  it('reports specification errors and sets a failing exit code', () => {
    const { logSpy, errorSpy } = captureConsole();
    resolveCommand('movie.mkv', 'enc=vp9', {});

    expect(errorSpy).toHaveBeenCalledWith(
      expect.anything(),
      'UNKNOWN_ENCODER_NAME: Unrecognized video encoder: vp9'
    );
    expect(logSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});
