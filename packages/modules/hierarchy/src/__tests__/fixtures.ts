import type { OrgRecord } from '../types';

export function org(code: string, name: string | null, rank: number | null, parentCode: string | null = null): OrgRecord {
  return { code, name, rank, parentCode };
}

/** Head Office → {Tokyo, Osaka} → Sales under each. */
export function salesTree(): OrgRecord[] {
  return [
    org('O1', 'Head Office', 1),
    org('O2', 'Tokyo', 2, 'O1'),
    org('O3', 'Osaka', 2, 'O1'),
    org('O4', 'Sales', 3, 'O2'),
    org('O5', 'Sales', 3, 'O3'),
  ];
}
