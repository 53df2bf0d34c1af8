import type {
  CommitResult,
  Employee,
  EmployeeResolution,
  IntentResult,
  LeaveRequestDraft,
  LeaveType,
  ReasonCode,
} from '@core/interfaces/index.js';

import type { NormalizedDate } from '@services/ai/nlu.types.js';

export type SessionState =
  | 'AwaitingIntent'
  | 'CollectingSlots'
  | 'Ready'
  | 'Submitted'
  | 'Cancelled'
  | 'Expired';

export const TERMINAL_STATES: readonly SessionState[] = ['Submitted', 'Cancelled', 'Expired'];

export type FlowIntent = 'apply_leave' | 'check_balance' | 'view_history';

/** Collected in this order; the first missing one is asked next. */
export type SlotName = 'employee' | 'leaveType' | 'startDate' | 'endDate';

export interface SlotValue {
  value: string;
  confidence: number;
  /** Turn the value was captured or last corrected on. */
  turn: number;
}

export interface EmployeeSlotValue extends SlotValue {
  name: string;
}

export interface DateChoice {
  slot: 'startDate' | 'endDate';
  candidates: string[];
}

export interface LeaveRequestSlots {
  employee?: EmployeeSlotValue;
  leaveType?: SlotValue;
  startDate?: SlotValue;
  endDate?: SlotValue;
  note?: string;
  /** Leave types a synonym matched, waiting for the user to pick one. */
  leaveTypeChoices?: LeaveType[];
  employeeChoices?: Employee[];
  dateChoice?: DateChoice;
  /** "for N days" heard before a start date was known. */
  durationDays?: number;
}

export type SessionOutcome =
  | { kind: 'committed'; requestId: string; dayCount: number }
  | { kind: 'rejected'; requestId: string; reasons: ReasonCode[] };

export interface ConversationSession {
  id: string;
  state: SessionState;
  flowIntent?: FlowIntent;
  slots: LeaveRequestSlots;
  requestedSlot?: SlotName;
  /** Id of the draft proposed in `Ready`; reused when a confirmation is retried. */
  requestId?: string;
  turn: number;
  version: number;
  createdAt: string;
  lastActivityAt: string;
  expiresAt: string;
  outcome?: SessionOutcome;
}

export interface DateMention {
  raw: string;
  normalized: NormalizedDate;
}

/** Everything the turn needs from the NLU layer, resolved before reducing. */
export interface Interpretation {
  text: string;
  intent: IntentResult;
  confirmation: boolean | null;
  employee?: { resolution: EmployeeResolution; confidence: number };
  leaveType?: { candidates: LeaveType[]; confidence: number };
  dates: DateMention[];
  durationDays?: number;
  /** A correction aimed at the end date ("until", "back on"). */
  endHint: boolean;
  /** 0-based pick from an offered list ("the second one"). */
  choice?: number;
  note?: string;
}

export type SlotIssue =
  | { slot: 'employee'; kind: 'employee_not_found'; reference: string }
  | { slot: 'employee'; kind: 'employee_ambiguous'; candidates: Employee[] }
  | { slot: 'leaveType'; kind: 'leave_type_ambiguous'; candidates: LeaveType[] }
  | { slot: 'startDate' | 'endDate'; kind: 'date_ambiguous'; raw: string; candidates: string[] }
  | { slot: 'startDate' | 'endDate'; kind: 'date_unparseable'; raw: string };

export type Effect =
  | { type: 'ASK_SLOT'; slot: SlotName; issue?: SlotIssue }
  | { type: 'PROPOSE_REQUEST'; draft: LeaveRequestDraft; corrected: boolean }
  | { type: 'COMMIT_REQUEST'; draft: LeaveRequestDraft }
  | { type: 'ANSWER_BALANCE'; employeeId: string }
  | { type: 'ANSWER_HISTORY'; employeeId: string }
  | { type: 'ANSWER_POLICY' }
  | { type: 'REQUEST_SUBMITTED'; requestId: string; dayCount: number }
  | { type: 'REQUEST_REJECTED'; requestId: string; reasons: ReasonCode[] }
  | { type: 'COMMIT_CONFLICT' }
  | { type: 'CANCELLED' }
  | { type: 'EXPIRED' }
  | { type: 'CLARIFY' };

export type ConversationEvent =
  | { type: 'USER_MESSAGE'; at: string; interpretation: Interpretation; newRequestId: string }
  | { type: 'COMMIT_RESULT'; at: string; result: CommitResult }
  | { type: 'TIMEOUT'; at: string };

export interface ReduceResult {
  session: ConversationSession;
  effects: Effect[];
}
