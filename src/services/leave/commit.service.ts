import { config } from '@config/env.config.js';

import type {
  BalanceStore,
  CommitResult,
  HolidayCalendar,
  LeaveBalance,
  LeaveRecordStore,
  LeaveRequest,
  LeaveRequestDraft,
  LeaveType,
  PolicyStore,
} from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';
import { todayISO } from '@utils/time.js';

import { validateLeaveRequest } from './validation.service.js';

export interface LedgerStores {
  balances: BalanceStore;
  records: LeaveRecordStore;
  policies: PolicyStore;
  holidays: HolidayCalendar;
}

const log = logger.child({ component: 'committer' });

/** Next ledger state: `pending` grows by `days`, version moves up by one. */
export function applyPending(balance: LeaveBalance, leaveType: LeaveType, days: number): LeaveBalance {
  const counts = balance.balances[leaveType] ?? { entitled: 0, used: 0, pending: 0 };
  return {
    ...balance,
    balances: {
      ...balance.balances,
      [leaveType]: { ...counts, pending: counts.pending + days },
    },
    version: balance.version + 1,
  };
}

function emptyBalance(employeeId: string): LeaveBalance {
  return { employeeId, balances: {}, version: 0 };
}

export class TransactionCommitter {
  constructor(
    private readonly stores: LedgerStores,
    private readonly maxRetries: number = config.COMMIT_MAX_RETRIES,
    private readonly today: () => string = () => todayISO(),
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async commit(draft: LeaveRequestDraft): Promise<CommitResult> {
    const { balances, records, policies, holidays } = this.stores;

    const policy = await policies.getPolicy(draft.leaveType);
    const holidayList = await holidays.listHolidays();
    const leaveType = policy?.leaveType ?? draft.leaveType;
    const attempts = 1 + this.maxRetries;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const previous = await records.findById(draft.employeeId, draft.id);
      if (previous?.status === 'Committed') {
        const balance =
          (await balances.readBalance(draft.employeeId)) ?? emptyBalance(draft.employeeId);
        log.info({ requestId: draft.id }, '[committer] request already committed');
        return { kind: 'accepted', request: previous, balance, attempts: 0 };
      }

      const balance =
        (await balances.readBalance(draft.employeeId)) ?? emptyBalance(draft.employeeId);
      const existing = await records.findByEmployee(draft.employeeId);
      const verdict = validateLeaveRequest({
        draft: { ...draft, leaveType },
        balance,
        policy,
        existing,
        holidays: holidayList,
        today: this.today(),
      });
      const createdAt = this.clock().toISOString();

      if (verdict.kind === 'rejected') {
        incrementCounter('leave_rejected');
        log.info(
          { requestId: draft.id, employeeId: draft.employeeId, reasons: verdict.reasons },
          '[committer] request rejected',
        );
        const request: LeaveRequest = {
          ...draft,
          leaveType,
          dayCount: verdict.dayCount,
          status: 'Rejected',
          createdAt,
        };
        return { kind: 'rejected', request, reasons: verdict.reasons };
      }

      const validated: LeaveRequest = {
        ...draft,
        leaveType,
        dayCount: verdict.dayCount,
        status: 'Validated',
        createdAt,
      };
      // Visible to concurrent overlap checks while the balance write is attempted.
      if (!(await records.insert(validated))) {
        incrementCounter('commit_cas_retry');
        log.debug({ requestId: draft.id, attempt }, '[committer] same request in flight');
        continue;
      }

      // From here the stored record is this attempt's own until it is committed or removed.
      const next = applyPending(balance, leaveType, verdict.dayCount);
      let written = false;
      try {
        written = await balances.casWriteBalance(balance, next);
        if (written) await records.updateStatus(draft.employeeId, draft.id, 'Committed');
      } catch (err) {
        if (!written) await records.remove(draft.employeeId, draft.id);
        log.error({ err, requestId: draft.id, attempt, written }, '[committer] commit failed');
        throw err;
      }

      if (written) {
        incrementCounter('leave_committed');
        log.info(
          { requestId: draft.id, employeeId: draft.employeeId, days: verdict.dayCount, attempt },
          '[committer] request committed',
        );
        return {
          kind: 'accepted',
          request: { ...validated, status: 'Committed' },
          balance: next,
          attempts: attempt,
        };
      }

      await records.remove(draft.employeeId, draft.id);
      incrementCounter('commit_cas_retry');
      log.debug(
        { requestId: draft.id, attempt, version: balance.version },
        '[committer] version mismatch',
      );
    }

    incrementCounter('commit_conflict');
    log.warn({ requestId: draft.id, attempts }, '[committer] retries exhausted');
    return { kind: 'conflict', attempts };
  }
}
