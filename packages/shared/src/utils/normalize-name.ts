/**
 * Canonical form of an organization display name for duplicate detection:
 * Unicode compatibility composition (NFKC) followed by lower-casing.
 * "ＳＡＬＥＳ" → "sales", null → ""
 */
export function normalizeName(name: string | null | undefined): string {
  if (name === null || name === undefined) return '';
  return name.normalize('NFKC').toLowerCase();
}
