import { describe, expect, it } from 'vitest';

import type { CommitResult, IntentName } from '@core/interfaces/index.js';

import { assertInvariants } from '@services/conversation/invariants.js';
import {
  ConversationStateMachine,
  createSession,
  mergeSlots,
  missingSlots,
} from '@services/conversation/state-machine.js';
import type {
  ConversationSession,
  Interpretation,
  LeaveRequestSlots,
} from '@services/conversation/state.types.js';

const AT = '2024-01-01T04:30:00.000Z';
const LATER = '2024-01-01T04:35:00.000Z';

const machine = new ConversationStateMachine(30);

function interp(partial: Partial<Interpretation> = {}, intent: IntentName = 'unknown'): Interpretation {
  return {
    text: '',
    intent: { intent, confidence: intent === 'unknown' ? 0 : 0.9, correction: false },
    confirmation: null,
    dates: [],
    endHint: false,
    ...partial,
  };
}

const meera = { value: '10001', name: 'Meera Iyer', confidence: 1, turn: 0 };

const fullSlots: LeaveRequestSlots = {
  employee: meera,
  leaveType: { value: 'sick', confidence: 1, turn: 1 },
  startDate: { value: '2024-01-05', confidence: 0.9, turn: 1 },
  endDate: { value: '2024-01-05', confidence: 0.8, turn: 1 },
};

function readySession(): ConversationSession {
  return {
    ...createSession('s1', AT, 30),
    state: 'Ready',
    flowIntent: 'apply_leave',
    slots: fullSlots,
    requestId: 'req-1',
    turn: 1,
    version: 1,
  };
}

describe('createSession', () => {
  it('starts awaiting an intent with the inactivity deadline set', () => {
    expect(createSession('s1', AT, 30)).toEqual({
      id: 's1',
      state: 'AwaitingIntent',
      slots: {},
      turn: 0,
      version: 0,
      createdAt: AT,
      lastActivityAt: AT,
      expiresAt: '2024-01-01T05:00:00.000Z',
    });
  });
});

describe('mergeSlots', () => {
  it('keeps a filled slot unless the user corrects it', () => {
    const slots: LeaveRequestSlots = { leaveType: { value: 'casual', confidence: 1, turn: 1 } };
    const sick = interp({ leaveType: { candidates: ['sick'], confidence: 1 } });

    expect(mergeSlots(slots, sick, undefined, 2, false).slots.leaveType).toEqual({
      value: 'casual',
      confidence: 1,
      turn: 1,
    });
    expect(mergeSlots(slots, sick, undefined, 2, true).slots.leaveType).toEqual({
      value: 'sick',
      confidence: 1,
      turn: 2,
    });
  });

  it('holds a duration until a start date arrives', () => {
    const first = mergeSlots({}, interp({ durationDays: 3 }), undefined, 1, false);
    expect(first.slots).toEqual({ durationDays: 3 });

    const second = mergeSlots(
      first.slots,
      interp({ dates: [{ raw: 'Jan 8', normalized: { kind: 'date', date: '2024-01-08' } }] }),
      'startDate',
      2,
      false,
    );
    expect(second.slots).toEqual({
      startDate: { value: '2024-01-08', confidence: 0.9, turn: 2 },
      endDate: { value: '2024-01-10', confidence: 0.8, turn: 2 },
      durationDays: undefined,
    });
  });

  it('offers the leave types a synonym matches and takes a pick by position', () => {
    const offered = mergeSlots(
      {},
      interp({ leaveType: { candidates: ['casual', 'parental'], confidence: 0.8 } }),
      undefined,
      1,
      false,
    );
    expect(offered.slots.leaveTypeChoices).toEqual(['casual', 'parental']);
    expect(offered.issues).toEqual([
      { slot: 'leaveType', kind: 'leave_type_ambiguous', candidates: ['casual', 'parental'] },
    ]);

    const picked = mergeSlots(offered.slots, interp({ choice: 1 }), 'leaveType', 2, false);
    expect(picked.slots.leaveType).toEqual({ value: 'parental', confidence: 1, turn: 2 });
    expect(picked.slots.leaveTypeChoices).toBeUndefined();
  });

  it('fills the end date when it is the one being asked for', () => {
    const { slots } = mergeSlots(
      { startDate: { value: '2024-01-08', confidence: 0.9, turn: 1 } },
      interp({ dates: [{ raw: 'Jan 10', normalized: { kind: 'date', date: '2024-01-10' } }] }),
      'endDate',
      2,
      false,
    );
    expect(slots.endDate).toEqual({ value: '2024-01-10', confidence: 0.9, turn: 2 });
  });

  it('moves the whole span when a correction changes the start', () => {
    const { slots } = mergeSlots(
      {
        startDate: { value: '2024-01-08', confidence: 0.9, turn: 1 },
        endDate: { value: '2024-01-10', confidence: 0.9, turn: 1 },
      },
      interp({ dates: [{ raw: 'Jan 15', normalized: { kind: 'date', date: '2024-01-15' } }] }),
      undefined,
      2,
      true,
    );
    expect(slots.startDate?.value).toBe('2024-01-15');
    expect(slots.endDate?.value).toBe('2024-01-17');
  });

  it('records an ambiguous date as a pending choice', () => {
    const { slots, issues } = mergeSlots(
      {},
      interp({
        dates: [
          {
            raw: '5/3',
            normalized: {
              kind: 'ambiguous',
              raw: '5/3',
              candidates: ['2024-03-05', '2024-05-03'],
              reason: 'day_month_order',
            },
          },
        ],
      }),
      undefined,
      1,
      false,
    );
    expect(slots.dateChoice).toEqual({ slot: 'startDate', candidates: ['2024-03-05', '2024-05-03'] });
    expect(issues).toEqual([
      {
        slot: 'startDate',
        kind: 'date_ambiguous',
        raw: '5/3',
        candidates: ['2024-03-05', '2024-05-03'],
      },
    ]);
  });
});

describe('ConversationStateMachine', () => {
  it('asks for the first missing slot', () => {
    const { session, effects } = machine.reduce(createSession('s1', AT, 30), {
      type: 'USER_MESSAGE',
      at: LATER,
      interpretation: interp({}, 'apply_leave'),
      newRequestId: 'req-1',
    });

    expect(session).toMatchObject({
      state: 'CollectingSlots',
      flowIntent: 'apply_leave',
      requestedSlot: 'employee',
      turn: 1,
      lastActivityAt: LATER,
      expiresAt: '2024-01-01T05:05:00.000Z',
    });
    expect(effects).toEqual([{ type: 'ASK_SLOT', slot: 'employee' }]);
    expect(missingSlots(session)).toEqual(['employee', 'leaveType', 'startDate', 'endDate']);
  });

  it('proposes the request once every slot is filled', () => {
    const { session, effects } = machine.reduce(
      { ...createSession('s1', AT, 30), slots: { employee: meera } },
      {
        type: 'USER_MESSAGE',
        at: LATER,
        interpretation: interp(
          {
            leaveType: { candidates: ['sick'], confidence: 1 },
            dates: [{ raw: 'next Friday', normalized: { kind: 'date', date: '2024-01-05' } }],
            durationDays: 1,
          },
          'apply_leave',
        ),
        newRequestId: 'req-1',
      },
    );

    expect(session.state).toBe('Ready');
    expect(session.requestId).toBe('req-1');
    expect(effects).toEqual([
      {
        type: 'PROPOSE_REQUEST',
        corrected: false,
        draft: {
          id: 'req-1',
          employeeId: '10001',
          leaveType: 'sick',
          startDate: '2024-01-05',
          endDate: '2024-01-05',
        },
      },
    ]);
  });

  it('asks to commit the proposed request on yes, reusing its id', () => {
    const { session, effects } = machine.reduce(readySession(), {
      type: 'USER_MESSAGE',
      at: LATER,
      interpretation: interp({ confirmation: true }, 'apply_leave'),
      newRequestId: 'req-2',
    });

    expect(session.state).toBe('Ready');
    expect(effects).toEqual([
      {
        type: 'COMMIT_REQUEST',
        draft: {
          id: 'req-1',
          employeeId: '10001',
          leaveType: 'sick',
          startDate: '2024-01-05',
          endDate: '2024-01-05',
        },
      },
    ]);
  });

  it('cancels on no', () => {
    const { session, effects } = machine.reduce(readySession(), {
      type: 'USER_MESSAGE',
      at: LATER,
      interpretation: interp({ confirmation: false }, 'apply_leave'),
      newRequestId: 'req-2',
    });
    expect(session.state).toBe('Cancelled');
    expect(effects).toEqual([{ type: 'CANCELLED' }]);
  });

  it('answers a balance question and re-proposes while ready', () => {
    const { session, effects } = machine.reduce(readySession(), {
      type: 'USER_MESSAGE',
      at: LATER,
      interpretation: interp({}, 'check_balance'),
      newRequestId: 'req-2',
    });
    expect(session.state).toBe('Ready');
    expect(effects.map((e) => e.type)).toEqual(['ANSWER_BALANCE', 'PROPOSE_REQUEST']);
  });

  it('answers balance mid-application without dropping collected slots', () => {
    const collecting: ConversationSession = {
      ...createSession('s1', AT, 30),
      state: 'CollectingSlots',
      flowIntent: 'apply_leave',
      requestedSlot: 'leaveType',
      slots: { employee: meera },
      turn: 1,
      version: 1,
    };
    const { session, effects } = machine.reduce(collecting, {
      type: 'USER_MESSAGE',
      at: LATER,
      interpretation: interp({}, 'check_balance'),
      newRequestId: 'req-2',
    });

    expect(session).toMatchObject({
      state: 'CollectingSlots',
      flowIntent: 'apply_leave',
      requestedSlot: 'leaveType',
    });
    expect(effects).toEqual([
      { type: 'ANSWER_BALANCE', employeeId: '10001' },
      { type: 'ASK_SLOT', slot: 'leaveType' },
    ]);
  });

  it('finishes on an accepted commit', () => {
    const result: CommitResult = {
      kind: 'accepted',
      attempts: 1,
      request: {
        id: 'req-1',
        employeeId: '10001',
        leaveType: 'sick',
        startDate: '2024-01-05',
        endDate: '2024-01-05',
        dayCount: 1,
        status: 'Committed',
        createdAt: LATER,
      },
      balance: { employeeId: '10001', balances: {}, version: 1 },
    };
    const { session, effects } = machine.reduce(readySession(), {
      type: 'COMMIT_RESULT',
      at: LATER,
      result,
    });

    expect(session.state).toBe('Submitted');
    expect(session.outcome).toEqual({ kind: 'committed', requestId: 'req-1', dayCount: 1 });
    expect(effects).toEqual([{ type: 'REQUEST_SUBMITTED', requestId: 'req-1', dayCount: 1 }]);
  });

  it('stays ready when the commit hits a conflict', () => {
    const ready = readySession();
    const { session, effects } = machine.reduce(ready, {
      type: 'COMMIT_RESULT',
      at: LATER,
      result: { kind: 'conflict', attempts: 4 },
    });
    expect(session).toBe(ready);
    expect(effects).toEqual([{ type: 'COMMIT_CONFLICT' }]);
  });

  it('ignores messages once the session has ended', () => {
    const cancelled: ConversationSession = { ...readySession(), state: 'Cancelled' };
    const { session, effects } = machine.reduce(cancelled, {
      type: 'USER_MESSAGE',
      at: LATER,
      interpretation: interp({ confirmation: true }, 'apply_leave'),
      newRequestId: 'req-2',
    });
    expect(session).toBe(cancelled);
    expect(effects).toEqual([]);
  });

  it('expires on timeout', () => {
    const { session, effects } = machine.reduce(readySession(), { type: 'TIMEOUT', at: LATER });
    expect(session.state).toBe('Expired');
    expect(effects).toEqual([{ type: 'EXPIRED' }]);
  });
});

describe('assertInvariants', () => {
  it('accepts a complete ready session', () => {
    expect(assertInvariants(readySession())).toEqual([]);
  });

  it('lists what a session is missing for its state', () => {
    expect(
      assertInvariants({ ...readySession(), requestId: undefined, slots: { employee: meera } }),
    ).toEqual(['leaveType_required', 'startDate_required', 'endDate_required', 'requestId_required']);
    expect(
      assertInvariants({ ...readySession(), state: 'CollectingSlots', requestedSlot: 'employee' }),
    ).toEqual(['requestedSlot_already_filled']);
    expect(assertInvariants({ ...readySession(), state: 'Submitted' })).toEqual(['outcome_required']);
  });
});
