import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';

import type { LeaveRequestDraft } from '@core/interfaces/index.js';

import { endForDuration } from '@services/ai/date.normalizer.js';

import { addDays, diffDays } from '@utils/time.js';

import type {
  ConversationEvent,
  ConversationSession,
  Effect,
  FlowIntent,
  Interpretation,
  LeaveRequestSlots,
  ReduceResult,
  SlotIssue,
  SlotName,
} from './state.types.js';

export const FLOW_SLOTS: Readonly<Record<FlowIntent, readonly SlotName[]>> = {
  apply_leave: ['employee', 'leaveType', 'startDate', 'endDate'],
  check_balance: ['employee'],
  view_history: ['employee'],
};

function plusMinutes(at: string, minutes: number): string {
  return DateTime.fromISO(at, { zone: 'utc' }).plus({ minutes }).toJSDate().toISOString();
}

export function createSession(id: string, at: string, ttlMinutes: number): ConversationSession {
  return {
    id,
    state: 'AwaitingIntent',
    slots: {},
    turn: 0,
    version: 0,
    createdAt: at,
    lastActivityAt: at,
    expiresAt: plusMinutes(at, ttlMinutes),
  };
}

export function missingSlots(session: ConversationSession): SlotName[] {
  if (!session.flowIntent) return [];
  return FLOW_SLOTS[session.flowIntent].filter((slot) => session.slots[slot] === undefined);
}

export function buildDraft(
  slots: LeaveRequestSlots,
  requestId: string,
): LeaveRequestDraft | null {
  const { employee, leaveType, startDate, endDate, note } = slots;
  if (!employee || !leaveType || !startDate || !endDate) return null;
  return {
    id: requestId,
    employeeId: employee.value,
    leaveType: leaveType.value,
    startDate: startDate.value,
    endDate: endDate.value,
    ...(note ? { note } : {}),
  };
}

function keepEmployee(slots: LeaveRequestSlots): LeaveRequestSlots {
  return slots.employee ? { employee: slots.employee } : {};
}

function hasSlotContent(interp: Interpretation): boolean {
  return Boolean(
    interp.employee ||
      interp.leaveType ||
      interp.dates.length ||
      interp.durationDays !== undefined ||
      interp.choice !== undefined,
  );
}

/**
 * Folds one utterance into the slot accumulator. Filled slots change only when `correction` is set;
 * problems found on the way come back as issues for the prompt.
 */
export function mergeSlots(
  slots: LeaveRequestSlots,
  interp: Interpretation,
  requested: SlotName | undefined,
  turn: number,
  correction: boolean,
): { slots: LeaveRequestSlots; issues: SlotIssue[] } {
  const out: LeaveRequestSlots = { ...slots };
  const issues: SlotIssue[] = [];
  const canSet = (slot: SlotName) => correction || out[slot] === undefined;

  // employee
  if (interp.choice !== undefined && requested === 'employee' && out.employeeChoices?.length) {
    const picked = out.employeeChoices[interp.choice];
    if (picked) {
      out.employee = { value: picked.employeeId, name: picked.name, confidence: 1, turn };
      out.employeeChoices = undefined;
    }
  }
  if (interp.employee && canSet('employee')) {
    const { resolution, confidence } = interp.employee;
    switch (resolution.kind) {
      case 'found':
        out.employee = {
          value: resolution.employee.employeeId,
          name: resolution.employee.name,
          confidence,
          turn,
        };
        out.employeeChoices = undefined;
        break;
      case 'ambiguous':
        out.employeeChoices = resolution.candidates;
        issues.push({ slot: 'employee', kind: 'employee_ambiguous', candidates: resolution.candidates });
        break;
      case 'not_found':
        issues.push({ slot: 'employee', kind: 'employee_not_found', reference: resolution.reference });
        break;
    }
  }

  // leave type
  if (interp.choice !== undefined && requested === 'leaveType' && out.leaveTypeChoices?.length) {
    const picked = out.leaveTypeChoices[interp.choice];
    if (picked) {
      out.leaveType = { value: picked, confidence: 1, turn };
      out.leaveTypeChoices = undefined;
    }
  }
  if (interp.leaveType && canSet('leaveType')) {
    const pending = out.leaveTypeChoices ?? [];
    const narrowed = interp.leaveType.candidates.filter((c) => pending.includes(c));
    const candidates = narrowed.length ? narrowed : interp.leaveType.candidates;
    if (candidates.length === 1) {
      out.leaveType = { value: candidates[0], confidence: interp.leaveType.confidence, turn };
      out.leaveTypeChoices = undefined;
    } else if (candidates.length > 1) {
      out.leaveTypeChoices = candidates;
      issues.push({ slot: 'leaveType', kind: 'leave_type_ambiguous', candidates });
    }
  }

  // dates
  const previousStart = slots.startDate?.value;
  const previousEnd = slots.endDate?.value;
  const changed = new Set<'startDate' | 'endDate'>();
  const setDate = (slot: 'startDate' | 'endDate', value: string, confidence = 0.9) => {
    out[slot] = { value, confidence, turn };
    if (out.dateChoice?.slot === slot) out.dateChoice = undefined;
    changed.add(slot);
  };

  const pendingChoice = out.dateChoice;
  if (interp.choice !== undefined && pendingChoice && requested === pendingChoice.slot) {
    const picked = pendingChoice.candidates[interp.choice];
    if (picked) setDate(pendingChoice.slot, picked, 1);
  }

  const dateTarget = (): 'startDate' | 'endDate' | null => {
    if (correction) {
      return interp.endHint || changed.has('startDate') ? 'endDate' : 'startDate';
    }
    if (out.dateChoice && out[out.dateChoice.slot] === undefined) return out.dateChoice.slot;
    if (requested === 'endDate' && out.startDate && !out.endDate) return 'endDate';
    if (!out.startDate) return 'startDate';
    if (changed.has('startDate') && !out.endDate) return 'endDate';
    return null;
  };

  for (const mention of interp.dates) {
    const normalized = mention.normalized;
    if (normalized.kind === 'range') {
      if (canSet('startDate')) setDate('startDate', normalized.start);
      if (canSet('endDate')) setDate('endDate', normalized.end);
      continue;
    }
    const target = dateTarget();
    if (!target) continue;
    switch (normalized.kind) {
      case 'date':
        setDate(target, normalized.date);
        break;
      case 'ambiguous':
        out.dateChoice = { slot: target, candidates: normalized.candidates };
        issues.push({
          slot: target,
          kind: 'date_ambiguous',
          raw: normalized.raw,
          candidates: normalized.candidates,
        });
        break;
      case 'unparseable':
        issues.push({ slot: target, kind: 'date_unparseable', raw: normalized.raw });
        break;
    }
  }

  // A corrected start keeps the previous span length unless the end was given too.
  if (
    correction &&
    changed.has('startDate') &&
    !changed.has('endDate') &&
    previousStart &&
    previousEnd &&
    out.startDate
  ) {
    const span = diffDays(previousStart, previousEnd);
    if (span >= 0 && interp.durationDays === undefined) {
      setDate('endDate', addDays(out.startDate.value, span));
    }
  }

  // duration
  const days = interp.durationDays ?? out.durationDays;
  if (days !== undefined) {
    const fresh = interp.durationDays !== undefined;
    if (
      out.startDate &&
      !changed.has('endDate') &&
      (out.endDate === undefined || (correction && fresh))
    ) {
      setDate('endDate', endForDuration(out.startDate.value, days), 0.8);
      out.durationDays = undefined;
    } else if (!out.startDate) {
      out.durationDays = days;
    }
  }

  if (interp.note) out.note = interp.note;

  return { slots: out, issues };
}

export class ConversationStateMachine {
  constructor(private readonly ttlMinutes: number = config.SESSION_TTL_MINUTES) {}

  reduce(current: ConversationSession, event: ConversationEvent): ReduceResult {
    switch (event.type) {
      case 'TIMEOUT':
        return {
          session: { ...current, state: 'Expired', requestedSlot: undefined },
          effects: [{ type: 'EXPIRED' }],
        };

      case 'COMMIT_RESULT': {
        const { result } = event;
        const base = { ...current, lastActivityAt: event.at, requestedSlot: undefined };
        if (result.kind === 'accepted') {
          return {
            session: {
              ...base,
              state: 'Submitted',
              outcome: {
                kind: 'committed',
                requestId: result.request.id,
                dayCount: result.request.dayCount,
              },
            },
            effects: [
              {
                type: 'REQUEST_SUBMITTED',
                requestId: result.request.id,
                dayCount: result.request.dayCount,
              },
            ],
          };
        }
        if (result.kind === 'rejected') {
          return {
            session: {
              ...base,
              state: 'Submitted',
              outcome: { kind: 'rejected', requestId: result.request.id, reasons: result.reasons },
            },
            effects: [
              { type: 'REQUEST_REJECTED', requestId: result.request.id, reasons: result.reasons },
            ],
          };
        }
        return { session: current, effects: [{ type: 'COMMIT_CONFLICT' }] };
      }

      case 'USER_MESSAGE':
        return this.onMessage(current, event);
    }
  }

  private onMessage(
    current: ConversationSession,
    event: Extract<ConversationEvent, { type: 'USER_MESSAGE' }>,
  ): ReduceResult {
    const { interpretation: interp, newRequestId } = event;
    const session: ConversationSession = {
      ...current,
      turn: current.turn + 1,
      lastActivityAt: event.at,
      expiresAt: plusMinutes(event.at, this.ttlMinutes),
    };
    const intent = interp.intent.intent;

    if (current.state === 'Submitted' || current.state === 'Cancelled' || current.state === 'Expired') {
      return { session: current, effects: [] };
    }

    if (intent === 'cancel') {
      return {
        session: { ...session, state: 'Cancelled', requestedSlot: undefined },
        effects: [{ type: 'CANCELLED' }],
      };
    }

    if (session.state === 'Ready') {
      return this.onReady(session, interp, newRequestId);
    }

    if (session.state === 'AwaitingIntent') {
      if (intent === 'policy_query') {
        return { session, effects: [{ type: 'ANSWER_POLICY' }] };
      }
      if (intent === 'unknown') {
        const { slots } = mergeSlots(
          keepEmployee(session.slots),
          { ...interp, leaveType: undefined, dates: [], durationDays: undefined },
          undefined,
          session.turn,
          false,
        );
        return { session: { ...session, slots }, effects: [{ type: 'CLARIFY' }] };
      }
      const started: ConversationSession = {
        ...session,
        state: 'CollectingSlots',
        flowIntent: intent,
        slots: keepEmployee(session.slots),
        requestedSlot: undefined,
      };
      return this.mergeAndAdvance(started, interp, newRequestId, []);
    }

    // CollectingSlots
    const flow = session.flowIntent ?? 'apply_leave';
    const prefix: Effect[] = [];
    let next: ConversationSession = { ...session, flowIntent: flow };

    if (intent === 'policy_query') {
      prefix.push({ type: 'ANSWER_POLICY' });
    } else if (intent === 'check_balance' || intent === 'view_history') {
      if (flow === 'apply_leave') {
        if (session.slots.employee) {
          prefix.push(
            intent === 'check_balance'
              ? { type: 'ANSWER_BALANCE', employeeId: session.slots.employee.value }
              : { type: 'ANSWER_HISTORY', employeeId: session.slots.employee.value },
          );
        }
      } else {
        next = { ...next, flowIntent: intent };
      }
    } else if (intent === 'apply_leave' && flow !== 'apply_leave') {
      next = { ...next, flowIntent: 'apply_leave' };
    }

    return this.mergeAndAdvance(next, interp, newRequestId, prefix);
  }

  private onReady(
    session: ConversationSession,
    interp: Interpretation,
    newRequestId: string,
  ): ReduceResult {
    const intent = interp.intent.intent;

    if (interp.intent.correction && hasSlotContent(interp)) {
      const { slots, issues } = mergeSlots(session.slots, interp, undefined, session.turn, true);
      return this.advance({ ...session, slots }, issues, newRequestId, [], true);
    }

    const draft = buildDraft(session.slots, session.requestId ?? newRequestId);
    if (!draft) {
      return this.advance(session, [], newRequestId, [], false);
    }

    if (interp.confirmation === true) {
      return {
        session: { ...session, requestId: draft.id },
        effects: [{ type: 'COMMIT_REQUEST', draft }],
      };
    }
    if (interp.confirmation === false) {
      return {
        session: { ...session, state: 'Cancelled', requestedSlot: undefined },
        effects: [{ type: 'CANCELLED' }],
      };
    }

    const effects: Effect[] = [];
    const employeeId = draft.employeeId;
    if (intent === 'check_balance') effects.push({ type: 'ANSWER_BALANCE', employeeId });
    if (intent === 'view_history') effects.push({ type: 'ANSWER_HISTORY', employeeId });
    if (intent === 'policy_query') effects.push({ type: 'ANSWER_POLICY' });
    effects.push({ type: 'PROPOSE_REQUEST', draft, corrected: false });
    return { session: { ...session, requestId: draft.id }, effects };
  }

  private mergeAndAdvance(
    session: ConversationSession,
    interp: Interpretation,
    newRequestId: string,
    prefix: Effect[],
  ): ReduceResult {
    const { slots, issues } = mergeSlots(
      session.slots,
      interp,
      session.requestedSlot,
      session.turn,
      interp.intent.correction,
    );
    return this.advance({ ...session, slots }, issues, newRequestId, prefix, false);
  }

  private advance(
    session: ConversationSession,
    issues: SlotIssue[],
    newRequestId: string,
    prefix: Effect[],
    corrected: boolean,
  ): ReduceResult {
    const flow = session.flowIntent ?? 'apply_leave';
    const missing = missingSlots({ ...session, flowIntent: flow });

    if (missing.length) {
      const slot = missing[0];
      const issue = issues.find((i) => i.slot === slot);
      return {
        session: {
          ...session,
          flowIntent: flow,
          state: 'CollectingSlots',
          requestedSlot: slot,
          requestId: undefined,
        },
        effects: [...prefix, issue ? { type: 'ASK_SLOT', slot, issue } : { type: 'ASK_SLOT', slot }],
      };
    }

    if (flow === 'apply_leave') {
      const draft = buildDraft(session.slots, newRequestId);
      if (draft) {
        return {
          session: {
            ...session,
            flowIntent: flow,
            state: 'Ready',
            requestedSlot: undefined,
            requestId: draft.id,
          },
          effects: [...prefix, { type: 'PROPOSE_REQUEST', draft, corrected }],
        };
      }
    }

    const employeeId = session.slots.employee?.value ?? '';
    return {
      session: {
        ...session,
        state: 'AwaitingIntent',
        flowIntent: undefined,
        requestedSlot: undefined,
        slots: keepEmployee(session.slots),
      },
      effects: [
        ...prefix,
        flow === 'view_history'
          ? { type: 'ANSWER_HISTORY', employeeId }
          : { type: 'ANSWER_BALANCE', employeeId },
      ],
    };
  }
}
