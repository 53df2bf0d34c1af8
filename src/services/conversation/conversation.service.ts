import { randomUUID } from 'crypto';

import { loadVocabulary, type Vocabulary } from '@config/data.loader.js';
import { config } from '@config/env.config.js';

import { ConflictError } from '@core/errors/conflict.error.js';
import type { LeaveRequestDraft } from '@core/interfaces/index.js';

import { ConfirmationParser } from '@services/ai/confirmation.parser.js';
import { normalizeDateExpression, normalizeRange } from '@services/ai/date.normalizer.js';
import { EntityExtractor } from '@services/ai/entity.extractor.js';
import { IntentClassifier } from '@services/ai/intent.classifier.js';
import { LeaveService } from '@services/leave/leave.service.js';

import { getStores, type AppStores } from '@infra/stores.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';
import { todayISO } from '@utils/time.js';

import { assertInvariants } from './invariants.js';
import * as messages from './messages.js';
import { ConversationStateMachine, buildDraft, createSession } from './state-machine.js';
import {
  TERMINAL_STATES,
  type ConversationSession,
  type Effect,
  type Interpretation,
  type SessionOutcome,
  type SessionState,
  type SlotName,
} from './state.types.js';

export interface TurnContext {
  /** Pre-fills the employee slot when the caller already knows who is talking. */
  employeeId?: string;
}

export interface TurnResult {
  sessionId: string;
  prompt: string;
  sessionState: SessionState;
  requestedSlot?: SlotName;
  pendingRequest?: LeaveRequestDraft;
  outcome?: SessionOutcome;
  previousSessionExpired?: boolean;
}

export interface ConversationOptions {
  vocabulary?: Vocabulary;
  clock?: () => Date;
  newId?: () => string;
  ttlMinutes?: number;
  writeRetries?: number;
  timezone?: string;
}

const CHOICE_WORDS: Record<string, number> = {
  first: 0,
  '1st': 0,
  '1': 0,
  second: 1,
  '2nd': 1,
  '2': 1,
  third: 2,
  '3rd': 2,
  '3': 2,
};

const CHOICE = /^\s*(?:the\s+)?(first|second|third|1st|2nd|3rd|1|2|3)(?:\s+one)?\s*[.!]?\s*$/i;
const END_HINT = /\b(?:end|ends|ending|until|till|back on|return(?:ing)? on)\b/i;
const NOTE = /\b(?:because|reason(?: is)?:?|due to)\s+(.+)$/i;
const NAME_LIKE = /^[A-Za-z][A-Za-z'.-]*(?:\s+[A-Za-z][A-Za-z'.-]*){0,2}$/;

const log = logger.child({ component: 'conversation' });

function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}

export class ConversationService {
  private readonly classifier: IntentClassifier;
  private readonly extractor: EntityExtractor;
  private readonly confirmation = new ConfirmationParser();
  private readonly machine: ConversationStateMachine;
  private readonly labels: messages.LeaveTypeLabels;
  private readonly clock: () => Date;
  private readonly newId: () => string;
  private readonly ttlMinutes: number;
  private readonly writeRetries: number;
  private readonly timezone: string;

  constructor(
    private readonly stores: Pick<AppStores, 'sessions' | 'directory'> = getStores(),
    private readonly leave: LeaveService = new LeaveService(),
    options: ConversationOptions = {},
  ) {
    const vocabulary = options.vocabulary ?? loadVocabulary();
    this.classifier = new IntentClassifier(vocabulary);
    this.extractor = new EntityExtractor(vocabulary);
    this.labels = Object.fromEntries(
      vocabulary.leaveTypes.map((entry) => [entry.type.toLowerCase(), entry.label]),
    );
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
    this.ttlMinutes = options.ttlMinutes ?? config.SESSION_TTL_MINUTES;
    this.writeRetries = options.writeRetries ?? config.SESSION_WRITE_RETRIES;
    this.timezone = options.timezone ?? config.TIMEZONE;
    this.machine = new ConversationStateMachine(this.ttlMinutes);
  }

  async classifyAndAdvance(
    sessionId: string,
    utterance: string,
    context: TurnContext = {},
  ): Promise<TurnResult> {
    const { sessions } = this.stores;
    let previousSessionExpired = false;

    for (let attempt = 0; attempt <= this.writeRetries; attempt += 1) {
      const now = this.clock();
      const at = now.toISOString();

      let stored = await sessions.get(sessionId);
      if (stored && !isTerminal(stored.state) && at > stored.expiresAt) {
        const { session: expired } = this.machine.reduce(stored, { type: 'TIMEOUT', at });
        log.info(
          { sessionId, state: stored.state, lastActivityAt: stored.lastActivityAt },
          '[conversation] session expired',
        );
        incrementCounter('session_expired');
        await sessions.delete(expired.id);
        previousSessionExpired = true;
        stored = null;
      } else if (stored && isTerminal(stored.state)) {
        await sessions.delete(stored.id);
        stored = null;
      }

      const session = stored ?? createSession(sessionId, at, this.ttlMinutes);
      const expectedVersion = stored ? stored.version : null;

      const { next, effects } = await this.runTurn(session, utterance, context, now);
      const toSave: ConversationSession = { ...next, version: session.version + 1 };

      if (!(await sessions.save(toSave, expectedVersion))) {
        incrementCounter('session_cas_retry');
        log.debug({ sessionId, attempt }, '[conversation] session version mismatch');
        continue;
      }
      if (isTerminal(toSave.state)) {
        await sessions.delete(toSave.id);
      }

      incrementCounter('conversation_turn');
      const prompt = await this.render(effects, toSave, previousSessionExpired);
      return this.toResult(toSave, prompt, previousSessionExpired);
    }

    incrementCounter('session_conflict');
    throw new ConflictError('The conversation was updated concurrently, please retry', {
      sessionId,
    });
  }

  private async runTurn(
    session: ConversationSession,
    utterance: string,
    context: TurnContext,
    now: Date,
  ): Promise<{ next: ConversationSession; effects: Effect[] }> {
    const at = now.toISOString();
    const today = todayISO(this.timezone, now);
    let current = session;

    if (context.employeeId && !current.slots.employee) {
      const resolution = await this.stores.directory.resolveEmployee(context.employeeId);
      if (resolution.kind === 'found') {
        current = {
          ...current,
          slots: {
            ...current.slots,
            employee: {
              value: resolution.employee.employeeId,
              name: resolution.employee.name,
              confidence: 1,
              turn: current.turn,
            },
          },
        };
      }
    }

    const interpretation = await this.interpret(utterance, current, today);
    const reduced = this.machine.reduce(current, {
      type: 'USER_MESSAGE',
      at,
      interpretation,
      newRequestId: this.newId(),
    });
    let next = reduced.session;
    const effects = [...reduced.effects];

    for (const effect of reduced.effects) {
      if (effect.type !== 'COMMIT_REQUEST') continue;
      const result = await this.leave.validateAndCommit(effect.draft);
      const after = this.machine.reduce(next, { type: 'COMMIT_RESULT', at, result });
      next = after.session;
      effects.push(...after.effects);
    }

    const issues = assertInvariants(next);
    if (issues.length) {
      log.warn({ sessionId: next.id, state: next.state, issues }, '[conversation] invariant violation');
    }
    log.debug(
      {
        sessionId: next.id,
        intent: interpretation.intent.intent,
        confidence: interpretation.intent.confidence,
        from: session.state,
        to: next.state,
      },
      '[conversation] turn',
    );
    return { next, effects };
  }

  private async interpret(
    utterance: string,
    session: ConversationSession,
    today: string,
  ): Promise<Interpretation> {
    const text = utterance.trim();
    const intent = this.classifier.classify(text, { activeIntent: session.flowIntent });
    const spans = this.extractor.extract(text);
    const confirmation = session.state === 'Ready' ? this.confirmation.parse(text) : null;

    const choiceMatch = CHOICE.exec(text);
    const choice = choiceMatch ? CHOICE_WORDS[choiceMatch[1].toLowerCase()] : undefined;

    const interpretation: Interpretation = {
      text,
      intent,
      confirmation,
      dates: [],
      endHint: END_HINT.test(text),
      ...(choice !== undefined ? { choice } : {}),
    };

    for (const span of spans) {
      switch (span.kind) {
        case 'date_expression': {
          const [first, second] = span.parts;
          const normalized =
            second !== undefined
              ? normalizeRange(first, second, today)
              : normalizeDateExpression(first, today);
          interpretation.dates.push({ raw: span.text, normalized });
          break;
        }
        case 'duration':
          interpretation.durationDays ??= span.days;
          break;
        case 'leave_type':
          interpretation.leaveType ??= { candidates: span.candidates, confidence: span.confidence };
          break;
        case 'employee_reference':
          if (!interpretation.employee) {
            const resolution = await this.stores.directory.resolveEmployee(span.reference);
            interpretation.employee = { resolution, confidence: span.confidence };
          }
          break;
      }
    }

    // A bare name typed in answer to the employee question.
    const answersEmployee =
      session.requestedSlot === 'employee' &&
      !interpretation.employee &&
      choice === undefined &&
      spans.length === 0 &&
      intent.intent !== 'cancel' &&
      intent.intent !== 'policy_query' &&
      NAME_LIKE.test(text);
    if (answersEmployee) {
      const resolution = await this.stores.directory.resolveEmployee(text);
      interpretation.employee = { resolution, confidence: 0.6 };
    }

    const note = NOTE.exec(text);
    if (note) interpretation.note = note[1].trim().slice(0, 200);

    return interpretation;
  }

  private async render(
    effects: Effect[],
    session: ConversationSession,
    previousSessionExpired: boolean,
  ): Promise<string> {
    const parts: string[] = previousSessionExpired ? [messages.EXPIRED_NOTICE] : [];
    const employeeName = session.slots.employee?.name ?? 'you';

    for (const effect of effects) {
      switch (effect.type) {
        case 'ASK_SLOT':
          parts.push(messages.askSlot(effect.slot, this.labels, effect.issue));
          break;
        case 'PROPOSE_REQUEST':
          parts.push(messages.proposeRequest(effect.draft, employeeName, this.labels, effect.corrected));
          break;
        case 'ANSWER_BALANCE':
          parts.push(
            messages.balanceSummary(await this.leave.getBalance(effect.employeeId), this.labels),
          );
          break;
        case 'ANSWER_HISTORY':
          parts.push(
            messages.historySummary(await this.leave.getHistory(effect.employeeId), this.labels),
          );
          break;
        case 'ANSWER_POLICY':
          parts.push(messages.policySummary(await this.leave.listPolicies(), this.labels));
          break;
        case 'REQUEST_SUBMITTED':
          parts.push(messages.submitted(effect.dayCount));
          break;
        case 'REQUEST_REJECTED':
          parts.push(messages.rejected(effect.reasons));
          break;
        case 'COMMIT_CONFLICT':
          parts.push(messages.CONFLICT);
          break;
        case 'CANCELLED':
          parts.push(messages.CANCELLED);
          break;
        case 'CLARIFY':
          parts.push(messages.CLARIFY);
          break;
        case 'COMMIT_REQUEST':
        case 'EXPIRED':
          break;
      }
    }
    return parts.join('\n\n');
  }

  private toResult(
    session: ConversationSession,
    prompt: string,
    previousSessionExpired: boolean,
  ): TurnResult {
    const result: TurnResult = { sessionId: session.id, prompt, sessionState: session.state };
    if (session.state === 'CollectingSlots' && session.requestedSlot) {
      result.requestedSlot = session.requestedSlot;
    }
    if (session.state === 'Ready' && session.requestId) {
      const draft = buildDraft(session.slots, session.requestId);
      if (draft) result.pendingRequest = draft;
    }
    if (session.outcome) result.outcome = session.outcome;
    if (previousSessionExpired) result.previousSessionExpired = true;
    return result;
  }
}
