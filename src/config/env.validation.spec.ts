import { validateEnv } from './env.validation';
import { resolveLogLevels } from './log-levels';

describe('validateEnv', () => {
  it('fills in defaults', () => {
    expect(validateEnv({ HOME: '/home/test' })).toEqual({
      HOME: '/home/test',
      FFMPEG_COMMAND: 'ffmpeg',
      FFMPEG_FALLBACK: true,
      SINGLE_TIMESTAMP_PRECISION: 'milliseconds',
      BATCH_TIMESTAMP_PRECISION: 'seconds',
      LOG_LEVEL: 'log',
    });
  });

  it('parses the fallback switch', () => {
    expect(validateEnv({ FFMPEG_FALLBACK: 'false' }).FFMPEG_FALLBACK).toBe(false);
  });

  it('names the invalid variable', () => {
    expect(() => validateEnv({ BATCH_TIMESTAMP_PRECISION: 'minutes' })).toThrow(
      /^Invalid environment configuration: BATCH_TIMESTAMP_PRECISION: /,
    );
  });
});

describe('resolveLogLevels', () => {
  it('includes every level up to the requested one', () => {
    expect(resolveLogLevels('debug')).toEqual(['error', 'warn', 'log', 'debug']);
    expect(resolveLogLevels('error')).toEqual(['error']);
  });

  it('defaults to log', () => {
    expect(resolveLogLevels(undefined)).toEqual(['error', 'warn', 'log']);
    expect(resolveLogLevels('loud')).toEqual(['error', 'warn', 'log']);
  });
});
