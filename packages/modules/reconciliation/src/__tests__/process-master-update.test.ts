import { afterEach, describe, expect, it, vi } from 'vitest';
import { SuffixValidationError } from '@mastersync/shared';
import { logger } from '@mastersync/core';
import { processMasterUpdate } from '../commands/process-master-update';
import { itemConfig, table } from './fixtures';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('processMasterUpdate', () => {
  it('logs and rethrows failures', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const local = table(['code', 'a', 'b', 'disable_flag', 'note'], []);
    const downloaded = table(['code', 'a', 'b', 'disable_flag'], []);

    expect(() => processMasterUpdate({ local, downloaded, sheetConfig: itemConfig() })).toThrow(
      SuffixValidationError,
    );
    expect(error).toHaveBeenCalledWith(
      'Master update failed',
      expect.objectContaining({
        entity: 'item',
        error: expect.objectContaining({ code: 'SUFFIX_VALIDATION' }),
      }),
    );
  });
});
