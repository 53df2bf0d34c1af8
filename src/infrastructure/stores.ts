import { loadHolidays, loadPolicies, loadSeed } from '@config/data.loader.js';
import { config } from '@config/env.config.js';

import type {
  BalanceStore,
  EmployeeDirectory,
  HolidayCalendar,
  LeaveRecordStore,
  PolicyStore,
  SessionStore,
} from '@core/interfaces/index.js';
import { InMemoryBalanceRepository, RedisBalanceRepository } from '@core/repositories/balance.repo.js';
import { SeedEmployeeDirectory } from '@core/repositories/employee.repo.js';
import {
  InMemoryLeaveRecordRepository,
  RedisLeaveRecordRepository,
} from '@core/repositories/leave-record.repo.js';
import { FileHolidayCalendar, FilePolicyRepository } from '@core/repositories/policy.repo.js';

import { InMemorySessionStore, RedisSessionStore } from '@services/conversation/state.store.js';
import type { ConversationSession } from '@services/conversation/state.types.js';

import { redis, type RedisClient } from './redis/redis.client.js';
import { balancesFromSeed, type SeedableBalanceStore } from './seed.js';

export interface AppStores {
  balances: BalanceStore & SeedableBalanceStore;
  records: LeaveRecordStore;
  policies: PolicyStore;
  holidays: HolidayCalendar;
  directory: EmployeeDirectory;
  sessions: SessionStore<ConversationSession>;
}

/** In-process stores with the ledger opened from `config/seed.json`. */
export function createMemoryStores(dir: string = config.CONFIG_DIR): AppStores {
  const seed = loadSeed(dir);
  return {
    balances: new InMemoryBalanceRepository(balancesFromSeed(seed)),
    records: new InMemoryLeaveRecordRepository(),
    policies: new FilePolicyRepository(loadPolicies(dir)),
    holidays: new FileHolidayCalendar(loadHolidays(dir)),
    directory: new SeedEmployeeDirectory(seed),
    sessions: new InMemorySessionStore(),
  };
}

export function createRedisStores(client: RedisClient = redis): AppStores {
  return {
    balances: new RedisBalanceRepository(client),
    records: new RedisLeaveRecordRepository(client),
    policies: new FilePolicyRepository(),
    holidays: new FileHolidayCalendar(),
    directory: new SeedEmployeeDirectory(),
    sessions: new RedisSessionStore(client),
  };
}

let stores: AppStores | null = null;

export function getStores(): AppStores {
  if (!stores) {
    stores = config.STORE_DRIVER === 'redis' ? createRedisStores() : createMemoryStores();
  }
  return stores;
}
