import { loadVocabulary, type Vocabulary } from '@config/data.loader.js';
import { config } from '@config/env.config.js';

import type { IntentContext, IntentName, IntentResult } from '@core/interfaces/index.js';

import { MONTH_PATTERN, WEEKDAY_PATTERN } from './date.lexicon.js';

type ScoredIntent = Exclude<IntentName, 'unknown'>;

export interface IntentRule {
  intent: ScoredIntent;
  pattern: RegExp;
  weight: number;
  /** Skipped for questions so "how many sick leaves do I have" does not read as a request. */
  statementOnly?: boolean;
}

export interface ClassifyOptions {
  rules: IntentRule[];
  minConfidence: number;
}

const SCORED_INTENTS: readonly ScoredIntent[] = [
  'apply_leave',
  'check_balance',
  'view_history',
  'policy_query',
  'cancel',
];

export const CONTEXT_PRIOR = 0.7;
export const AMBIGUITY_MARGIN = 0.2;

const QUESTION =
  /\?\s*$|^\s*(?:what|how|when|which|who|why|is|are|am|can|could|do|does|did|will|should)\b/i;
const CORRECTION =
  /\b(?:actually|instead|i meant|i mean|correction|make it|change (?:it|that|the)|switch (?:it )?to|no wait)\b/i;

const DATE_WORD = `today|tomorrow|tmrw|next week|${WEEKDAY_PATTERN}|${MONTH_PATTERN}|\\d{1,2}[/.]\\d{1,2}|\\d{4}-\\d{2}-\\d{2}`;

const BASE_RULES: IntentRule[] = [
  {
    intent: 'apply_leave',
    pattern:
      /\b(?:apply|applying|request|requesting|book|booking|take|taking|need|want|would like|put in)\b(?:\s+[\w'-]+){0,2}?\s+(?:leaves?|day off|days off|time off|vacation)\b(?!\s+(?:balance|history|polic))/i,
    weight: 0.9,
  },
  { intent: 'apply_leave', pattern: /\btak(?:e|ing)\b(?:\s+[\w'-]+){0,3}?\s+off\b/i, weight: 0.85 },
  {
    intent: 'apply_leave',
    pattern: /\b(?:i am|i'm|im|feeling|feel)\s+(?:sick|ill|unwell|not well)\b/i,
    weight: 0.8,
  },
  { intent: 'apply_leave', pattern: /\b(?:out of (?:the )?office|ooo)\b/i, weight: 0.7 },
  {
    intent: 'apply_leave',
    pattern: new RegExp(`^(?=.*\\bleaves?\\b)(?=.*\\b(?:${DATE_WORD})\\b)`, 'i'),
    weight: 0.5,
    statementOnly: true,
  },
  {
    intent: 'apply_leave',
    pattern: /\b(?:\d+|a|an|one|two|three|four|five|six|seven|ten)[\s-]+(?:days?|weeks?)\b/i,
    weight: 0.4,
    statementOnly: true,
  },
  {
    intent: 'apply_leave',
    pattern: /\b(?:leaves?|day off|days off|time off|vacation)\b/i,
    weight: 0.3,
    statementOnly: true,
  },

  { intent: 'check_balance', pattern: /\bbalances?\b/i, weight: 0.9 },
  {
    intent: 'check_balance',
    pattern: /\bhow (?:many|much)\b.*\b(?:leaves?|days?|left|remaining)\b/i,
    weight: 0.9,
  },
  { intent: 'check_balance', pattern: /\b(?:left|remaining)\b/i, weight: 0.6 },

  { intent: 'view_history', pattern: /\bhistory\b/i, weight: 0.9 },
  {
    intent: 'view_history',
    pattern: /\b(?:past|previous|earlier|last)\s+(?:leaves|leave requests|requests|applications)\b/i,
    weight: 0.85,
  },
  {
    intent: 'view_history',
    pattern: /\bleaves?\s+(?:(?:i|i've|i have)\s+)?(?:taken|took|applied)\b/i,
    weight: 0.7,
  },

  { intent: 'policy_query', pattern: /\bpolic(?:y|ies)\b/i, weight: 0.9 },
  { intent: 'policy_query', pattern: /\b(?:notice period|blackouts?|black-out)\b/i, weight: 0.8 },
  {
    intent: 'policy_query',
    pattern: /\b(?:rules?|allowed|eligible|eligibility)\b/i,
    weight: 0.6,
  },

  {
    intent: 'cancel',
    pattern: /^\s*(?:cancel|stop|abort|quit|exit|never ?mind|forget it)\b/i,
    weight: 0.95,
  },
  {
    intent: 'cancel',
    pattern: /\b(?:cancel|never ?mind|forget it|scrap that|start over)\b/i,
    weight: 0.8,
  },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** Base rules plus a "<type> leave" rule built from the vocabulary. */
export function buildRules(vocabulary: Vocabulary): IntentRule[] {
  const words = vocabulary.leaveTypes
    .flatMap((entry) => [entry.type, ...entry.synonyms])
    .map((w) => w.toLowerCase())
    .sort((a, b) => b.length - a.length);
  if (!words.length) return [...BASE_RULES];
  const typed: IntentRule = {
    intent: 'apply_leave',
    pattern: new RegExp(`\\b(?:${[...new Set(words)].map(escapeRegExp).join('|')})\\s+leaves?\\b`, 'i'),
    weight: 0.45,
    statementOnly: true,
  };
  return [...BASE_RULES, typed];
}

/** Noisy-or score per intent, before the context prior. */
export function scoreIntents(utterance: string, rules: IntentRule[]): Record<ScoredIntent, number> {
  const isQuestion = QUESTION.test(utterance);
  const misses: Record<ScoredIntent, number> = {
    apply_leave: 1,
    check_balance: 1,
    view_history: 1,
    policy_query: 1,
    cancel: 1,
  };
  for (const rule of rules) {
    if (rule.statementOnly && isQuestion) continue;
    if (rule.pattern.test(utterance)) misses[rule.intent] *= 1 - rule.weight;
  }
  return {
    apply_leave: 1 - misses.apply_leave,
    check_balance: 1 - misses.check_balance,
    view_history: 1 - misses.view_history,
    policy_query: 1 - misses.policy_query,
    cancel: 1 - misses.cancel,
  };
}

export function classifyIntent(
  utterance: string,
  context: IntentContext,
  options: ClassifyOptions,
): IntentResult {
  const correction = CORRECTION.test(utterance);
  const scores = scoreIntents(utterance, options.rules);

  const active = context.activeIntent;
  if (active && active !== 'unknown' && active !== 'cancel') {
    scores[active] = 1 - (1 - scores[active]) * (1 - CONTEXT_PRIOR);
  }

  const ranked = SCORED_INTENTS.map((intent) => ({ intent, score: round(scores[intent]) })).sort(
    (a, b) => b.score - a.score,
  );
  const [best, runnerUp] = ranked;
  const gap = round(best.score - runnerUp.score);
  const confidence = gap < AMBIGUITY_MARGIN ? gap : best.score;

  if (best.score === 0 || confidence < options.minConfidence) {
    return { intent: 'unknown', confidence, correction };
  }
  return { intent: best.intent, confidence, correction };
}

export class IntentClassifier {
  private readonly rules: IntentRule[];

  constructor(
    vocabulary: Vocabulary = loadVocabulary(),
    private readonly minConfidence: number = config.INTENT_MIN_CONFIDENCE,
  ) {
    this.rules = buildRules(vocabulary);
  }

  classify(utterance: string, context: IntentContext = {}): IntentResult {
    return classifyIntent(utterance, context, { rules: this.rules, minConfidence: this.minConfidence });
  }
}
