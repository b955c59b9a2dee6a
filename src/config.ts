export const DEFAULT_MAX_BUFFER_SIZE = 1024 * 1024;

export interface ParserLimits {
  /** Ceiling on buffered bytes that do not yet form a whole capsule. */
  maxBufferSize: number;
}

export function validateMaxBufferSize(value: number, source: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${source} must be a positive integer, got ${value}`);
  }
  return value;
}

export function loadParserLimits(env: NodeJS.ProcessEnv = process.env): ParserLimits {
  const raw = env.CAPSULE_CODEC_MAX_BUFFER_SIZE;
  if (raw === undefined || raw.trim() === '') {
    return { maxBufferSize: DEFAULT_MAX_BUFFER_SIZE };
  }
  return {
    maxBufferSize: validateMaxBufferSize(Number(raw), 'CAPSULE_CODEC_MAX_BUFFER_SIZE'),
  };
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.CAPSULE_CODEC_DEBUG;
  return value === '1' || value === 'true';
}
