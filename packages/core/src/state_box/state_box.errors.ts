import type { DocumentStoreErrorCode } from '../document_store/document_store.errors';

/**
 * Error kinds raised by StateBox.
 *
 * - VALIDATION: bad caller input (task name, status, issue text, release). Never retried.
 * - CONCURRENCY: version conflict with retry disabled, or retries exhausted.
 * - BACKEND: store, network or codec failure, wrapped with context.
 * - DOMAIN_RULE: blocker uniqueness, missing or ambiguous issue match.
 */
export type StateBoxErrorKind = 'VALIDATION' | 'CONCURRENCY' | 'BACKEND' | 'DOMAIN_RULE';

export type DomainRule = 'DUPLICATE_BLOCKER' | 'ISSUE_NOT_FOUND' | 'AMBIGUOUS_ISSUE';

export type StateBoxErrorDetail =
  | {
    kind: 'VALIDATION';
    field: string;
    value?: unknown;
  }
  | {
    kind: 'CONCURRENCY';
    /** Version this process based its write on (null = expected a create) */
    expectedVersion: string | null;
    /** Version found in the store (null = not known / document missing) */
    actualVersion: string | null;
    attempts: number;
  }
  | {
    kind: 'BACKEND';
    operation: string;
    storeCode?: DocumentStoreErrorCode;
  }
  | {
    kind: 'DOMAIN_RULE';
    rule: DomainRule;
    /** Issue descriptions the caller needs to see to resolve the problem */
    candidates: string[];
  };

/**
 * Single error type for StateBox; callers switch on `detail.kind`.
 */
export class StateBoxError extends Error {
  public readonly detail: StateBoxErrorDetail;

  constructor(message: string, detail: StateBoxErrorDetail, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StateBoxError';
    this.detail = detail;
    Object.setPrototypeOf(this, StateBoxError.prototype);
  }

  get kind(): StateBoxErrorKind {
    return this.detail.kind;
  }
}

export function isStateBoxError(error: unknown, kind?: StateBoxErrorKind): error is StateBoxError {
  return error instanceof StateBoxError && (kind === undefined || error.kind === kind);
}

export function validationError(field: string, message: string, value?: unknown): StateBoxError {
  return new StateBoxError(message, { kind: 'VALIDATION', field, value });
}

export function domainRuleError(rule: DomainRule, message: string, candidates: string[]): StateBoxError {
  return new StateBoxError(message, { kind: 'DOMAIN_RULE', rule, candidates });
}
