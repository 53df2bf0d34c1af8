export type IntentName =
  | 'apply_leave'
  | 'check_balance'
  | 'view_history'
  | 'policy_query'
  | 'cancel'
  | 'unknown';

export interface IntentResult {
  intent: IntentName;
  confidence: number;
  /** True when the utterance explicitly corrects an earlier answer ("actually", "make it"). */
  correction: boolean;
}

export interface IntentContext {
  activeIntent?: IntentName;
}

export type * from './leave.types.js';
export type * from './store.types.js';
