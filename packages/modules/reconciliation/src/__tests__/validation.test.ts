import { afterEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '@mastersync/shared';
import { resetRunConfig } from '@mastersync/core';
import { defineSheetConfig, userEntityProfile } from '../validation';

afterEach(() => {
  vi.unstubAllEnvs();
  resetRunConfig();
});

describe('defineSheetConfig', () => {
  it('derives compare columns in column order', () => {
    const config = defineSheetConfig({
      name: 'organization',
      columnNames: ['org_code', 'org_name', 'updated_at', 'parent_code', 'disable_flag'],
      keyColumns: ['org_code'],
      dropColumns: ['updated_at'],
    });

    expect(config.compareColumns).toEqual(['org_name', 'parent_code', 'disable_flag']);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.compareColumns)).toBe(true);
  });

  it('rejects unknown keys, dropped keys and repeated names', () => {
    expect(() => defineSheetConfig({ name: 'x', columnNames: ['a', 'b'], keyColumns: ['c'] })).toThrow(ValidationError);
    expect(() =>
      defineSheetConfig({ name: 'x', columnNames: ['a', 'b'], keyColumns: ['a'], dropColumns: ['a'] }),
    ).toThrow(ValidationError);
    expect(() => defineSheetConfig({ name: 'x', columnNames: ['a', 'a'], keyColumns: ['a'] })).toThrow(ValidationError);
  });
});

describe('userEntityProfile', () => {
  it('reads the group column count from the environment', () => {
    vi.stubEnv('USER_GROUP_COLUMN_COUNT', '2');
    vi.stubEnv('RETIREMENT_SENTINEL', 'RETIRED');
    resetRunConfig();

    expect(userEntityProfile()).toEqual({
      kind: 'user',
      departmentColumn: 'department_code',
      retirementSentinel: 'RETIRED',
      blankColumns: ['disable_flag', 'user_group1', 'user_group2'],
    });
  });
});
