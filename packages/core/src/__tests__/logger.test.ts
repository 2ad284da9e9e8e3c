import { afterEach, describe, expect, it, vi } from 'vitest';
import { errorFields, getLogLevel, isLogLevel, logger, setLogLevel } from '../observability/logger';
import { AppError } from '@mastersync/shared';

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('writes one JSON line per entry to stdout', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    setLogLevel('info');
    logger.info('Graph built', { entity: 'organization', rowCount: 5 });

    expect(write).toHaveBeenCalledTimes(1);
    const line = String(write.mock.calls[0]?.[0]);
    expect(line.endsWith('\n')).toBe(true);
    const entry = JSON.parse(line);
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('Graph built');
    expect(entry.entity).toBe('organization');
    expect(entry.rowCount).toBe(5);
  });

  it('routes errors to stderr', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logger.error('boom');
    expect(err).toHaveBeenCalledTimes(1);
    expect(out).not.toHaveBeenCalled();
  });

  it('drops entries below the minimum level', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    setLogLevel('warn');
    logger.info('ignored');
    logger.debug('ignored');
    expect(write).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('rejects object prototype keys', () => {
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
  });
});

describe('errorFields', () => {
  it('keeps the AppError code', () => {
    const fields = errorFields(new AppError('SUFFIX_VALIDATION', 'bad columns'));
    expect(fields.code).toBe('SUFFIX_VALIDATION');
    expect(fields.message).toBe('bad columns');
  });

  it('stringifies non-errors', () => {
    expect(errorFields('plain')).toEqual({ message: 'plain' });
  });
});
