import { loadHolidays, loadPolicies, type HolidayFile, type PolicyFile } from '@config/data.loader.js';

import type {
  Holiday,
  HolidayCalendar,
  LeavePolicy,
  LeaveType,
  PolicyStore,
} from '@core/interfaces/index.js';

export class FilePolicyRepository implements PolicyStore {
  private readonly policies: Map<LeaveType, LeavePolicy>;

  constructor(file: PolicyFile = loadPolicies()) {
    this.policies = new Map(file.policies.map((p) => [p.leaveType.toLowerCase(), p]));
  }

  async getPolicy(leaveType: LeaveType): Promise<LeavePolicy | null> {
    return this.policies.get(leaveType.toLowerCase()) ?? null;
  }

  async listPolicies(): Promise<LeavePolicy[]> {
    return [...this.policies.values()];
  }
}

export class FileHolidayCalendar implements HolidayCalendar {
  private readonly holidays: Holiday[];

  constructor(file: HolidayFile = loadHolidays()) {
    this.holidays = [...file.holidays].sort((a, b) => a.date.localeCompare(b.date));
  }

  async listHolidays(): Promise<Holiday[]> {
    return [...this.holidays];
  }
}
