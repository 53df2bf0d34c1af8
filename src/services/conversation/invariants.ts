import { FLOW_SLOTS } from './state-machine.js';
import type { ConversationSession } from './state.types.js';

export function assertInvariants(session: ConversationSession): string[] {
  const issues: string[] = [];
  const { slots } = session;

  if (session.state === 'Ready') {
    for (const slot of FLOW_SLOTS.apply_leave) {
      if (!slots[slot]) issues.push(`${slot}_required`);
    }
    if (!session.requestId) issues.push('requestId_required');
  }

  if (session.state === 'CollectingSlots') {
    if (!session.flowIntent) issues.push('flowIntent_required');
    if (!session.requestedSlot) issues.push('requestedSlot_required');
    else if (slots[session.requestedSlot]) issues.push('requestedSlot_already_filled');
  }

  if (session.state === 'Submitted' && !session.outcome) {
    issues.push('outcome_required');
  }
  return issues;
}
