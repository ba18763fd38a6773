import { describe, expect, it } from 'vitest';
import { createLogger, silentLogger } from '../../src/host/logger';

const capture = (verbose: boolean, prefix?: string) => {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger({
    verbose,
    log: (line) => out.push(line),
    logError: (line) => err.push(line),
    ...(prefix !== undefined ? { prefix } : {}),
  });
  return { logger, out, err };
};

describe('logger', () => {
  it('prefixes lines and splits them by level', () => {
    const { logger, out, err } = capture(false);
    logger.info('hello');
    logger.warn('careful');
    logger.error('broken');
    expect(out).toEqual(['[sdspi] hello']);
    expect(err).toEqual(['[sdspi] careful', '[sdspi] broken']);
  });

  it('emits debug lines only when verbose', () => {
    const quiet = capture(false);
    quiet.logger.debug('detail');
    expect(quiet.out).toEqual([]);

    const loud = capture(true);
    loud.logger.debug('detail');
    expect(loud.out).toEqual(['[sdspi] detail']);
  });

  it('omits the separator for an empty prefix', () => {
    const { logger, out } = capture(false, '');
    logger.info('bare');
    expect(out).toEqual(['bare']);
  });

  it('drops everything with the silent logger', () => {
    expect(() => silentLogger.error('ignored')).not.toThrow();
  });
});
