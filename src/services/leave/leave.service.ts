import { NotFoundError } from '@core/errors/not-found.error.js';
import type {
  CommitResult,
  Employee,
  LeaveBalance,
  LeavePolicy,
  LeaveRequest,
  LeaveRequestDraft,
} from '@core/interfaces/index.js';

import { getStores, type AppStores } from '@infra/stores.js';

import { TransactionCommitter } from './commit.service.js';

type LeaveStores = Pick<AppStores, 'balances' | 'records' | 'policies' | 'holidays' | 'directory'>;

export class LeaveService {
  constructor(
    private readonly stores: LeaveStores = getStores(),
    private readonly committer: TransactionCommitter = new TransactionCommitter(stores),
  ) {}

  validateAndCommit(draft: LeaveRequestDraft): Promise<CommitResult> {
    return this.committer.commit({ ...draft, leaveType: draft.leaveType.trim().toLowerCase() });
  }

  async getEmployee(employeeId: string): Promise<Employee> {
    const employee = await this.stores.directory.getEmployee(employeeId);
    if (!employee) throw new NotFoundError(`Employee ${employeeId} not found`);
    return employee;
  }

  listEmployees(): Promise<Employee[]> {
    return this.stores.directory.listEmployees();
  }

  async getBalance(employeeId: string): Promise<LeaveBalance> {
    const employee = await this.getEmployee(employeeId);
    const balance = await this.stores.balances.readBalance(employee.employeeId);
    return balance ?? { employeeId: employee.employeeId, balances: {}, version: 0 };
  }

  /** Committed requests, earliest start first. */
  async getHistory(employeeId: string): Promise<LeaveRequest[]> {
    const employee = await this.getEmployee(employeeId);
    const records = await this.stores.records.findByEmployee(employee.employeeId);
    return records
      .filter((r) => r.status === 'Committed')
      .sort((a, b) => a.startDate.localeCompare(b.startDate) || a.createdAt.localeCompare(b.createdAt));
  }

  listPolicies(): Promise<LeavePolicy[]> {
    return this.stores.policies.listPolicies();
  }
}
