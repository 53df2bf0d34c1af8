import type {
  Employee,
  EmployeeResolution,
  Holiday,
  LeaveBalance,
  LeavePolicy,
  LeaveRequest,
  LeaveRequestStatus,
  LeaveType,
} from './leave.types.js';

export interface BalanceStore {
  readBalance(employeeId: string): Promise<LeaveBalance | null>;
  /**
   * Writes `next` only if the stored version still equals `current.version`.
   * Resolves false on a version mismatch; nothing is written in that case.
   */
  casWriteBalance(current: LeaveBalance, next: LeaveBalance): Promise<boolean>;
}

export interface LeaveRecordStore {
  /** Resolves false when a record with the same id is already stored. */
  insert(request: LeaveRequest): Promise<boolean>;
  updateStatus(employeeId: string, id: string, status: LeaveRequestStatus): Promise<void>;
  remove(employeeId: string, id: string): Promise<void>;
  findById(employeeId: string, id: string): Promise<LeaveRequest | null>;
  findByEmployee(employeeId: string): Promise<LeaveRequest[]>;
}

export interface PolicyStore {
  getPolicy(leaveType: LeaveType): Promise<LeavePolicy | null>;
  listPolicies(): Promise<LeavePolicy[]>;
}

export interface EmployeeDirectory {
  resolveEmployee(reference: string): Promise<EmployeeResolution>;
  getEmployee(employeeId: string): Promise<Employee | null>;
  listEmployees(): Promise<Employee[]>;
}

export interface HolidayCalendar {
  listHolidays(): Promise<Holiday[]>;
}

/** Keyed store for versioned documents such as conversation sessions. */
export interface SessionStore<S extends { id: string; version: number }> {
  get(id: string): Promise<S | null>;
  /**
   * Saves `next` when the stored version equals `expectedVersion` (`null`: nothing stored yet).
   * `next.version` must be `(expectedVersion ?? 0) + 1`.
   */
  save(next: S, expectedVersion: number | null): Promise<boolean>;
  delete(id: string): Promise<void>;
}
