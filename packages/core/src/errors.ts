// packages/core/src/errors.ts
export type ErrorCode =
  | 'RS_VALIDATION'
  | 'RS_NOT_FOUND'
  | 'RS_UNKNOWN_KIND'
  | 'RS_DUPLICATE_KIND'
  | 'RS_DUPLICATE_ASSOCIATION'
  | 'RS_UNKNOWN_ASSOCIATION'
  | 'RS_DUPLICATE_SCOPE'
  | 'RS_UNKNOWN_SCOPE'
  | 'RS_EMPTY_SET'
  | 'RS_PLAN_MATERIALIZED';

export interface Issue {
  path: string;
  msg: string;
}

export class RecsetError extends Error {
  constructor(readonly code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends RecsetError {
  constructor(message: string, readonly issues: Issue[] = []) {
    super('RS_VALIDATION', issues.length
      ? `${message}: ${issues.map((i) => (i.path ? `${i.path} ${i.msg}` : i.msg)).join('; ')}`
      : message);
  }
}

export class NotFoundError extends RecsetError {
  constructor(readonly kind: string, readonly id: number) {
    super('RS_NOT_FOUND', `${kind} #${id} not found`);
  }
}

export class UnknownKindError extends RecsetError {
  constructor(readonly kind: string) {
    super('RS_UNKNOWN_KIND', `Unknown kind: ${kind}`);
  }
}

export class DuplicateKindError extends RecsetError {
  constructor(readonly kind: string) {
    super('RS_DUPLICATE_KIND', `Kind already defined: ${kind}`);
  }
}

export class DuplicateAssociationError extends RecsetError {
  constructor(readonly kind: string, readonly association: string) {
    super('RS_DUPLICATE_ASSOCIATION', `${kind}.${association} is already defined`);
  }
}

export class UnknownAssociationError extends RecsetError {
  constructor(readonly kind: string, readonly association: string) {
    super('RS_UNKNOWN_ASSOCIATION', `Unknown association: ${kind}.${association}`);
  }
}

export class DuplicateScopeError extends RecsetError {
  constructor(readonly kind: string, readonly scope: string) {
    super('RS_DUPLICATE_SCOPE', `Scope already defined: ${kind}.${scope}`);
  }
}

export class UnknownScopeError extends RecsetError {
  constructor(readonly kind: string, readonly scope: string) {
    super('RS_UNKNOWN_SCOPE', `Unknown scope: ${kind}.${scope}`);
  }
}

export class EmptySetError extends RecsetError {
  constructor(readonly kind: string) {
    super('RS_EMPTY_SET', `No ${kind} records in result set`);
  }
}

export class MaterializedPlanError extends RecsetError {
  constructor(readonly kind: string) {
    super('RS_PLAN_MATERIALIZED', `Query on ${kind} was already materialized; build a new one`);
  }
}

export function isRecsetError(e: unknown): e is RecsetError {
  return e instanceof RecsetError;
}
