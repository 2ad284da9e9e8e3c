/** One flat input record from the upstream org source. `rank` is the org tier, not graph depth. */
export interface OrgRecord {
  code: string;
  name: string | null;
  parentCode: string | null;
  rank: number | null;
}

export interface OrgNode {
  code: string;
  name: string | null;
  rank: number | null;
  /** Created only because a record named it as parent. */
  implicit: boolean;
}

export interface RankSlot {
  code: string | null;
  name: string | null;
}

/** An org record with its `rank{1..R}_code/name` slots; `ranks[r - 1]` holds rank r. */
export interface RankedOrganization extends OrgRecord {
  ranks: RankSlot[];
}

export interface DuplicateGroup {
  normalizedName: string;
  members: RankedOrganization[];
}

export interface IdentifiedOrganization {
  organization: RankedOrganization;
  normalizedName: string;
  /** Empty string means no identifier could be determined. */
  identifier: string;
}

export interface OverrideInput {
  orgCode: string;
  abbreviation: string | null;
}

export interface AbbreviationOverride {
  orgCode: string;
  abbreviation: string;
  rank: number;
}

/** Iteration order is the order rows were supplied; the first qualifying entry wins. */
export type OverrideTable = ReadonlyMap<string, AbbreviationOverride>;
