import { z } from 'zod';
import { ValidationError } from '../errors';

/** Codes arrive as strings or numbers from spreadsheets; both become strings. */
export const codeSchema = z.union([z.string(), z.number()]).transform((v) => String(v).trim()).pipe(z.string().min(1));

/**
 * Optional cell: blank strings, null and undefined all collapse to null.
 * "  " → null, 12 → "12"
 */
export const optionalTextSchema = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const text = String(v).trim();
    return text === '' ? null : text;
  });

/** Integer-convertible rank; blank means "absent" and is rejected later by rank validation. */
export const optionalRankSchema = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((v, ctx) => {
    if (v === null || v === undefined) return null;
    if (typeof v === 'string' && v.trim() === '') return null;
    const num = Number(v);
    if (!Number.isInteger(num)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `rank must be an integer, got ${String(v)}` });
      return z.NEVER;
    }
    return num;
  });

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(rows);
 * assertValidated(parsed);
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}
