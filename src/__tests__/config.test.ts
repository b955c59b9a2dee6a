import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_BUFFER_SIZE, isDebugEnabled, loadParserLimits } from '../config.js';

describe('loadParserLimits', () => {
  it('defaults to one mebibyte', () => {
    expect(DEFAULT_MAX_BUFFER_SIZE).toBe(1048576);
    expect(loadParserLimits({})).toEqual({ maxBufferSize: 1048576 });
    expect(loadParserLimits({ CAPSULE_CODEC_MAX_BUFFER_SIZE: ' ' })).toEqual({ maxBufferSize: 1048576 });
  });

  it('reads the ceiling from the environment', () => {
    expect(loadParserLimits({ CAPSULE_CODEC_MAX_BUFFER_SIZE: '4096' })).toEqual({ maxBufferSize: 4096 });
  });

  it('rejects values that are not positive integers', () => {
    for (const value of ['abc', '0', '-5', '1.5']) {
      expect(() => loadParserLimits({ CAPSULE_CODEC_MAX_BUFFER_SIZE: value })).toThrow(RangeError);
    }
  });
});

describe('isDebugEnabled', () => {
  it('reads CAPSULE_CODEC_DEBUG', () => {
    expect(isDebugEnabled({})).toBe(false);
    expect(isDebugEnabled({ CAPSULE_CODEC_DEBUG: '1' })).toBe(true);
    expect(isDebugEnabled({ CAPSULE_CODEC_DEBUG: 'true' })).toBe(true);
    expect(isDebugEnabled({ CAPSULE_CODEC_DEBUG: '0' })).toBe(false);
  });
});
