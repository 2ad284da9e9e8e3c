import { z } from 'zod';
import { assertValidated } from '@mastersync/shared';
import { getRunConfig } from '@mastersync/core';
import type { RunConfig } from '@mastersync/core';
import { DISABLE_FLAG_COLUMN } from './types';
import type { EntityProfile, SheetConfig } from './types';

// ── Sheet Config ─────────────────────────────────────────────────────

export const sheetConfigInputSchema = z
  .object({
    name: z.string().min(1).max(100),
    columnNames: z.array(z.string().min(1)).min(1),
    keyColumns: z.array(z.string().min(1)).min(1),
    dropColumns: z.array(z.string().min(1)).default([]),
  })
  .superRefine((cfg, ctx) => {
    const known = new Set(cfg.columnNames);
    if (known.size !== cfg.columnNames.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['columnNames'], message: 'Column names must be unique' });
    }
    for (const key of cfg.keyColumns) {
      if (!known.has(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['keyColumns'], message: `Unknown key column ${key}` });
      }
      if (cfg.dropColumns.includes(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dropColumns'], message: `Key column ${key} cannot be dropped` });
      }
    }
    for (const drop of cfg.dropColumns) {
      if (!known.has(drop)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dropColumns'], message: `Unknown drop column ${drop}` });
      }
    }
  });

export type SheetConfigInput = z.input<typeof sheetConfigInputSchema>;

export function defineSheetConfig(input: SheetConfigInput): SheetConfig {
  const parsed = sheetConfigInputSchema.safeParse(input);
  assertValidated(parsed, 'Invalid sheet configuration');
  const { name, columnNames, keyColumns, dropColumns } = parsed.data;

  const excluded = new Set([...keyColumns, ...dropColumns]);
  return Object.freeze({
    name,
    columnNames: Object.freeze([...columnNames]),
    keyColumns: Object.freeze([...keyColumns]),
    dropColumns: Object.freeze([...dropColumns]),
    compareColumns: Object.freeze(columnNames.filter((c) => !excluded.has(c))),
  });
}

// ── Entity Profiles ──────────────────────────────────────────────────

export const STANDARD_ENTITY: EntityProfile = { kind: 'standard' };

/** User-like profile; blanks `disable_flag` and `user_group1..N` on retirement. */
export function userEntityProfile(users: RunConfig['users'] = getRunConfig().users): EntityProfile {
  const groupColumns = Array.from({ length: users.groupColumnCount }, (_, i) => `user_group${i + 1}`);
  return {
    kind: 'user',
    departmentColumn: users.departmentColumn,
    retirementSentinel: users.retirementSentinel,
    blankColumns: [DISABLE_FLAG_COLUMN, ...groupColumns],
  };
}
