import { z } from 'zod';
import { assertValidated, codeSchema, optionalRankSchema, optionalTextSchema } from '@mastersync/shared';
import type { OrgRecord, OverrideInput } from './types';

// Display names keep their spacing; only absent/empty cells become null.
const displayNameSchema = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v) => (v === null || v === undefined || String(v) === '' ? null : String(v)));

// ── Org Records ──────────────────────────────────────────────────────

export const orgInputRowSchema = z
  .object({
    org_code: codeSchema,
    org_name: displayNameSchema,
    parent_code: optionalTextSchema,
    parent_org_code: optionalTextSchema,
    rank: optionalRankSchema,
  })
  .transform(
    (r): OrgRecord => ({
      code: r.org_code,
      name: r.org_name,
      parentCode: r.parent_code ?? r.parent_org_code,
      rank: r.rank,
    }),
  );

export type OrgInputRow = z.input<typeof orgInputRowSchema>;

export function parseOrgRecords(rows: unknown[]): OrgRecord[] {
  const parsed = z.array(orgInputRowSchema).safeParse(rows);
  assertValidated(parsed, 'Invalid organization rows');
  return parsed.data;
}

// ── Abbreviation Overrides ───────────────────────────────────────────

export const overrideInputRowSchema = z
  .object({
    org_code: codeSchema,
    abbreviation: optionalTextSchema,
  })
  .transform(
    (r): OverrideInput => ({
      orgCode: r.org_code,
      abbreviation: r.abbreviation,
    }),
  );

export type OverrideInputRow = z.input<typeof overrideInputRowSchema>;

export function parseOverrideRows(rows: unknown[]): OverrideInput[] {
  const parsed = z.array(overrideInputRowSchema).safeParse(rows);
  assertValidated(parsed, 'Invalid abbreviation rows');
  return parsed.data;
}
