import type { ZodIssue } from 'zod';
import type { AgreementStatus } from './domain/enums';

export const VALIDATION_ERROR = 'VALIDATION_ERROR';
export const NOT_FOUND = 'NOT_FOUND';
export const INVALID_TRANSITION = 'INVALID_TRANSITION';
export const CEILING_EXCEEDED = 'CEILING_EXCEEDED';

/**
 * Base class for every error the ledger raises on purpose.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ValidationError extends AppError {
  public readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(VALIDATION_ERROR, message, { issues });
    this.issues = issues;
  }
}

export type LedgerEntity = 'agreement' | 'purchase_order';

export class NotFoundError extends AppError {
  public readonly entity: LedgerEntity;
  public readonly id: string;

  constructor(entity: LedgerEntity, id: string) {
    super(NOT_FOUND, `${entity === 'agreement' ? 'Agreement' : 'Purchase order'} ${id} not found`, { entity, id });
    this.entity = entity;
    this.id = id;
  }
}

export class InvalidTransitionError extends AppError {
  /** As stored, which may be a value outside the known statuses. */
  public readonly from: string;
  public readonly to: AgreementStatus;

  constructor(from: string, to: AgreementStatus) {
    super(INVALID_TRANSITION, `Invalid status transition from ${from} to ${to}`, { from, to });
    this.from = from;
    this.to = to;
  }
}

const formatSar = (amount: number): string =>
  amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/**
 * Raised when a purchase order would push an agreement past its ceiling.
 * All three amounts are in the base currency.
 */
export class CeilingExceededError extends AppError {
  public readonly agreementId: string;
  public readonly currentTotal: number;
  public readonly newValue: number;
  public readonly ceiling: number;

  constructor(agreementId: string, currentTotal: number, newValue: number, ceiling: number) {
    super(
      CEILING_EXCEEDED,
      'Adding this PO would exceed the agreement ceiling. ' +
        `Current: ${formatSar(currentTotal)} SAR, New PO: ${formatSar(newValue)} SAR, ` +
        `Ceiling: ${formatSar(ceiling)} SAR`,
      { agreementId, currentTotal, newValue, ceiling },
    );
    this.agreementId = agreementId;
    this.currentTotal = currentTotal;
    this.newValue = newValue;
    this.ceiling = ceiling;
  }
}
