import type {
  LeaveBalance,
  LeavePolicy,
  LeaveRequest,
  LeaveRequestDraft,
  ReasonCode,
} from '@core/interfaces/index.js';

import { fromISODate } from '@utils/time.js';

import type { SlotIssue, SlotName } from './state.types.js';

export type LeaveTypeLabels = Readonly<Record<string, string>>;

const REASON_TEXT: Record<ReasonCode, string> = {
  UnknownLeaveType: 'that leave type is not configured',
  InsufficientNotice: 'it does not meet the minimum notice period',
  EndBeforeStart: 'the end date is before the start date',
  ExceedsMaxConsecutive: 'it exceeds the maximum number of consecutive days',
  Blackout: 'it falls in a blackout period',
  InsufficientBalance: 'there is not enough balance left',
  Overlap: 'it overlaps an existing leave request',
  NoChargeableDays: 'the range has no working days to charge',
};

const SLOT_QUESTION: Record<SlotName, string> = {
  employee: 'Could you tell me your employee ID or full name?',
  leaveType: 'Which type of leave would you like to take?',
  startDate: 'From which date would you like the leave to start?',
  endDate: 'Until which date (inclusive) should the leave run?',
};

export function formatDate(iso: string): string {
  return fromISODate(iso).setLocale('en-GB').toFormat('ccc d LLL yyyy');
}

function labelFor(leaveType: string, labels: LeaveTypeLabels): string {
  return labels[leaveType] ?? `${leaveType} leave`;
}

export function describeReason(reason: ReasonCode): string {
  return REASON_TEXT[reason];
}

export function askSlot(slot: SlotName, labels: LeaveTypeLabels, issue?: SlotIssue): string {
  const question = SLOT_QUESTION[slot];
  if (!issue) {
    if (slot === 'leaveType') {
      return `${question} Options: ${Object.values(labels).join(', ')}.`;
    }
    return question;
  }
  switch (issue.kind) {
    case 'employee_not_found':
      return `I could not find an employee matching "${issue.reference}". ${question}`;
    case 'employee_ambiguous': {
      const names = issue.candidates.map((e) => `${e.name} (${e.employeeId})`).join(' or ');
      return `More than one employee matches. Did you mean ${names}?`;
    }
    case 'leave_type_ambiguous': {
      const options = issue.candidates.map((t) => labelFor(t, labels)).join(' or ');
      return `Did you mean ${options}?`;
    }
    case 'date_ambiguous': {
      const options = issue.candidates.map(formatDate).join(' or ');
      return `"${issue.raw}" could mean ${options}. Which one did you mean?`;
    }
    case 'date_unparseable':
      return `I could not understand the date "${issue.raw}". ${question}`;
  }
}

export function proposeRequest(
  draft: LeaveRequestDraft,
  employeeName: string,
  labels: LeaveTypeLabels,
  corrected: boolean,
): string {
  const lead = corrected ? 'Updated. ' : '';
  const when =
    draft.startDate === draft.endDate
      ? `on ${formatDate(draft.startDate)}`
      : `from ${formatDate(draft.startDate)} to ${formatDate(draft.endDate)}`;
  return `${lead}Please confirm: ${labelFor(draft.leaveType, labels)} for ${employeeName} ${when}. Shall I submit it? (yes/no)`;
}

export function submitted(dayCount: number): string {
  return `Done. Your leave request for ${dayCount} day${dayCount === 1 ? '' : 's'} has been submitted.`;
}

export function rejected(reasons: ReasonCode[]): string {
  return `I could not submit the request because ${reasons.map(describeReason).join('; ')}.`;
}

export const CONFLICT =
  'Your balance changed while I was submitting. Please confirm again to retry. (yes/no)';
export const CANCELLED = 'Okay, I have cancelled this request.';
export const CLARIFY =
  'Sorry, I did not get that. You can apply for leave, check your balance, view your leave history or ask about leave policies.';
export const EXPIRED_NOTICE = 'Your previous conversation timed out, so we are starting over.';

export function balanceSummary(balance: LeaveBalance, labels: LeaveTypeLabels): string {
  const lines = Object.entries(balance.balances)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([type, c]) => {
      const available = c.entitled - c.used - c.pending;
      return `${labelFor(type, labels)}: ${available} of ${c.entitled} available (${c.pending} pending)`;
    });
  return lines.length ? `Your leave balance:\n${lines.join('\n')}` : 'You have no leave balance on record.';
}

export function historySummary(records: LeaveRequest[], labels: LeaveTypeLabels): string {
  if (!records.length) return 'You have no leave requests on record.';
  const lines = records.map(
    (r) =>
      `${labelFor(r.leaveType, labels)}: ${formatDate(r.startDate)} to ${formatDate(r.endDate)} (${r.dayCount} day${r.dayCount === 1 ? '' : 's'})`,
  );
  return `Your leave history:\n${lines.join('\n')}`;
}

export function policySummary(policies: LeavePolicy[], labels: LeaveTypeLabels): string {
  const lines = policies.map((p) => {
    const blackouts = p.blackouts.length
      ? `; blackout ${p.blackouts.map((b) => `${formatDate(b.start)} to ${formatDate(b.end)}`).join(', ')}`
      : '';
    return `${labelFor(p.leaveType, labels)}: ${p.minNoticeDays} days notice, up to ${p.maxConsecutiveDays} consecutive days${blackouts}`;
  });
  return `Leave policies:\n${lines.join('\n')}`;
}
