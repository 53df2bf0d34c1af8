import type {
  Holiday,
  LeaveBalance,
  LeavePolicy,
  LeaveRequest,
  LeaveRequestDraft,
  ReasonCode,
  ValidationVerdict,
} from '@core/interfaces/index.js';

import { addDays, diffDays, eachDate, isWeekend, overlaps } from '@utils/time.js';

export interface ValidationInput {
  draft: LeaveRequestDraft;
  balance: LeaveBalance | null;
  policy: LeavePolicy | null;
  existing: LeaveRequest[];
  holidays: Holiday[];
  /** ISO date the notice period is measured from. */
  today: string;
}

/** Days charged against the balance; weekends and holidays drop out unless the policy counts them. */
export function chargeableDays(
  startDate: string,
  endDate: string,
  policy: Pick<LeavePolicy, 'countWeekends' | 'countHolidays'>,
  holidays: Holiday[],
): number {
  const holidaySet = new Set(holidays.map((h) => h.date));
  return eachDate(startDate, endDate).filter((date) => {
    if (!policy.countWeekends && isWeekend(date)) return false;
    if (!policy.countHolidays && holidaySet.has(date)) return false;
    return true;
  }).length;
}

export function availableDays(balance: LeaveBalance | null, leaveType: string): number {
  const counts = balance?.balances[leaveType];
  if (!counts) return 0;
  return counts.entitled - counts.used - counts.pending;
}

/**
 * Runs every rule and reports all violations. Only an unknown leave type stops early,
 * since the remaining rules need its policy.
 */
export function validateLeaveRequest(input: ValidationInput): ValidationVerdict {
  const { draft, balance, policy, existing, holidays, today } = input;
  if (!policy) {
    return { kind: 'rejected', reasons: ['UnknownLeaveType'], dayCount: 0 };
  }

  const reasons: ReasonCode[] = [];
  const { startDate, endDate } = draft;
  const dayCount = chargeableDays(startDate, endDate, policy, holidays);

  if (startDate < addDays(today, policy.minNoticeDays)) {
    reasons.push('InsufficientNotice');
  }

  const ordered = endDate >= startDate;
  if (!ordered) {
    reasons.push('EndBeforeStart');
  }

  if (ordered && diffDays(startDate, endDate) + 1 > policy.maxConsecutiveDays) {
    reasons.push('ExceedsMaxConsecutive');
  }

  if (ordered && policy.blackouts.some((b) => overlaps(startDate, endDate, b.start, b.end))) {
    reasons.push('Blackout');
  }

  if (dayCount > availableDays(balance, draft.leaveType)) {
    reasons.push('InsufficientBalance');
  }

  const clashes = existing.some(
    (r) =>
      r.id !== draft.id &&
      (r.status === 'Committed' || r.status === 'Validated') &&
      overlaps(startDate, endDate, r.startDate, r.endDate),
  );
  if (ordered && clashes) {
    reasons.push('Overlap');
  }

  if (ordered && dayCount === 0) {
    reasons.push('NoChargeableDays');
  }

  return reasons.length ? { kind: 'rejected', reasons, dayCount } : { kind: 'accepted', dayCount };
}
