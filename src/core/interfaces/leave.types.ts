/** Leave types are configured in the vocabulary file, e.g. `casual`, `sick`, `parental`. */
export type LeaveType = string;

export interface LeaveCounts {
  entitled: number;
  used: number;
  pending: number;
}

export interface LeaveBalance {
  employeeId: string;
  balances: Record<LeaveType, LeaveCounts>;
  /** Incremented by exactly one on every successful ledger write. */
  version: number;
}

export interface BlackoutRange {
  /** ISO date 'yyyy-MM-dd', inclusive */
  start: string;
  /** ISO date 'yyyy-MM-dd', inclusive */
  end: string;
  label?: string;
}

export interface LeavePolicy {
  leaveType: LeaveType;
  minNoticeDays: number;
  maxConsecutiveDays: number;
  blackouts: BlackoutRange[];
  countWeekends: boolean;
  countHolidays: boolean;
}

export interface Holiday {
  date: string;
  name: string;
}

export interface Employee {
  employeeId: string;
  name: string;
  project?: string;
}

export type LeaveRequestStatus = 'Draft' | 'Validated' | 'Committed' | 'Rejected';

export interface LeaveRequestDraft {
  id: string;
  employeeId: string;
  leaveType: LeaveType;
  startDate: string;
  endDate: string;
  note?: string;
}

export interface LeaveRequest extends LeaveRequestDraft {
  dayCount: number;
  status: LeaveRequestStatus;
  createdAt: string;
}

export type ReasonCode =
  | 'UnknownLeaveType'
  | 'InsufficientNotice'
  | 'EndBeforeStart'
  | 'ExceedsMaxConsecutive'
  | 'Blackout'
  | 'InsufficientBalance'
  | 'Overlap'
  | 'NoChargeableDays';

export type ValidationVerdict =
  | { kind: 'accepted'; dayCount: number }
  | { kind: 'rejected'; reasons: ReasonCode[]; dayCount: number };

export type CommitResult =
  | { kind: 'accepted'; request: LeaveRequest; balance: LeaveBalance; attempts: number }
  | { kind: 'rejected'; request: LeaveRequest; reasons: ReasonCode[] }
  | { kind: 'conflict'; attempts: number };

export type EmployeeResolution =
  | { kind: 'found'; employee: Employee }
  | { kind: 'not_found'; reference: string }
  | { kind: 'ambiguous'; reference: string; candidates: Employee[] };
