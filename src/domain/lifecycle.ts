import { InvalidTransitionError } from '../errors';
import { isAgreementStatus, type AgreementStatus } from './enums';
import type { IsoDate } from './types';

/**
 * Directed edges of the agreement lifecycle. Expired and Terminated are terminal.
 */
export const ALLOWED_STATUS_TRANSITIONS: Readonly<Record<AgreementStatus, readonly AgreementStatus[]>> = {
  Pipeline: ['Draft', 'Terminated'],
  Draft: ['LegalReview', 'Pipeline', 'Terminated'],
  LegalReview: ['SignaturePending', 'Draft', 'Terminated'],
  SignaturePending: ['Signed', 'LegalReview', 'Terminated'],
  Signed: ['Active', 'Terminated'],
  Active: ['Expired', 'Terminated'],
  Expired: [],
  Terminated: [],
};

/**
 * Whether `to` is reachable from `from` in one step. An unrecognized `from`
 * has no outgoing edges.
 */
export function canTransition(from: string, to: AgreementStatus): boolean {
  return isAgreementStatus(from) && ALLOWED_STATUS_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: AgreementStatus): boolean {
  return ALLOWED_STATUS_TRANSITIONS[status].length === 0;
}

export function assertTransition(from: string, to: AgreementStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export type TransitionPlan =
  | { kind: 'unchanged' }
  | {
      kind: 'transition';
      from: AgreementStatus;
      to: AgreementStatus;
      statusDate: IsoDate;
      /** Set when entering Signed on an agreement with no signature date yet. */
      signedDate?: IsoDate;
    };

export interface TransitionSubject {
  status: AgreementStatus;
  signedDate: IsoDate | null;
}

/**
 * Decide what a requested status change does to an agreement.
 * Re-applying the current status is a no-op and skips edge validation.
 */
export function planTransition(
  agreement: TransitionSubject,
  requested: AgreementStatus,
  today: IsoDate,
): TransitionPlan {
  if (requested === agreement.status) {
    return { kind: 'unchanged' };
  }

  assertTransition(agreement.status, requested);

  const plan: TransitionPlan = {
    kind: 'transition',
    from: agreement.status,
    to: requested,
    statusDate: today,
  };
  if (requested === 'Signed' && !agreement.signedDate) {
    plan.signedDate = today;
  }
  return plan;
}

/**
 * Return a copy of `agreement` moved to `requested`, or the same object when
 * the status is unchanged. Throws InvalidTransitionError for disallowed edges.
 */
export function transition<T extends TransitionSubject & { statusDate: IsoDate }>(
  agreement: T,
  requested: AgreementStatus,
  today: IsoDate,
): T {
  const plan = planTransition(agreement, requested, today);
  if (plan.kind === 'unchanged') {
    return agreement;
  }
  return {
    ...agreement,
    status: plan.to,
    statusDate: plan.statusDate,
    signedDate: plan.signedDate ?? agreement.signedDate,
  };
}
