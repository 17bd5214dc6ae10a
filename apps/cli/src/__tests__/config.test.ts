import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config/index.js';

describe('loadConfig', () => {
  it('defaults to pretty output with no default specification', () => {
    expect(loadConfig({})).toEqual({
      defaultFormats: undefined,
      outputFormat: 'pretty',
      outputDir: undefined,
    });
  });

  it('reads the specification and output settings from the environment', () => {
    const config = loadConfig({
      ENCODE_SPEC_FORMATS: 'enc=x265,q=20',
      ENCODE_SPEC_OUTPUT: 'json',
      ENCODE_SPEC_OUTPUT_DIR: '/encodes',
    });

    expect(config).toEqual({
      defaultFormats: 'enc=x265,q=20',
      outputFormat: 'json',
      outputDir: '/encodes',
    });
  });

  it('rejects an unknown output format', () => {
    expect(() => loadConfig({ ENCODE_SPEC_OUTPUT: 'xml' })).toThrow(ZodError);
  });
});
