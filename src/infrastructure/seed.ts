import type { SeedFile } from '@config/data.loader.js';

import type { LeaveBalance } from '@core/interfaces/index.js';

import { logger } from '@utils/logger.js';

export interface SeedableBalanceStore {
  seedBalance(balance: LeaveBalance): Promise<boolean>;
}

/** Opening ledger: every configured entitlement, nothing used or pending. */
export function balancesFromSeed(seed: SeedFile): LeaveBalance[] {
  return seed.employees.map((employee) => ({
    employeeId: employee.employeeId,
    balances: Object.fromEntries(
      Object.entries(employee.balances).map(([leaveType, entitled]) => [
        leaveType.toLowerCase(),
        { entitled, used: 0, pending: 0 },
      ]),
    ),
    version: 0,
  }));
}

/** Writes missing balances; existing ones are left alone. Returns how many were written. */
export async function seedLedger(store: SeedableBalanceStore, seed: SeedFile): Promise<number> {
  let written = 0;
  for (const balance of balancesFromSeed(seed)) {
    if (await store.seedBalance(balance)) written += 1;
  }
  logger.info({ written, total: seed.employees.length }, '[seed] ledger seeded');
  return written;
}
