export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super('NOT_FOUND', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

// ── Hierarchy ────────────────────────────────────────────────────────

export class CyclicHierarchyError extends AppError {
  constructor(public cycleCodes: string[]) {
    super(
      'CYCLIC_HIERARCHY',
      `Organization hierarchy contains a cycle through: ${cycleCodes.join(', ')}`,
      422,
    );
  }
}

export class MissingOrCorruptRankError extends AppError {
  constructor(
    public orgCode: string,
    public rank: number | null,
  ) {
    super('MISSING_OR_CORRUPT_RANK', `Organization ${orgCode} has an invalid rank: ${String(rank)}`, 422);
  }
}

export class MappingOrgNotFoundError extends AppError {
  constructor(public orgCode: string) {
    super('MAPPING_ORG_NOT_FOUND', `Abbreviation org code ${orgCode} does not exist in the hierarchy`, 404);
  }
}

// ── Reconciliation ───────────────────────────────────────────────────

export class SuffixValidationError extends AppError {
  constructor(public columns: string[]) {
    super(
      'SUFFIX_VALIDATION',
      `Joined columns are missing a _left/_right suffix: ${columns.join(', ')}`,
      422,
      columns.map((field) => ({ field, message: 'Column exists on only one side of the join' })),
    );
  }
}

export class ReferentialIntegrityError extends AppError {
  constructor(
    public column: string,
    public missingCodes: string[],
  ) {
    super(
      'REFERENTIAL_INTEGRITY',
      `Values of ${column} not found in the reference table: ${missingCodes.join(', ')}`,
      422,
    );
  }
}

export class InvalidFlagError extends AppError {
  constructor(public values: unknown[]) {
    super('INVALID_FLAG', `Change set contains invalid flags: ${values.map(String).join(', ')}`, 422);
  }
}

export class InvalidDisableFlagError extends AppError {
  constructor(public values: unknown[]) {
    super(
      'INVALID_DISABLE_FLAG',
      `Change set contains invalid disable flags: ${values.map(String).join(', ')}`,
      422,
    );
  }
}
