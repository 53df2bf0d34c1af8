import { WatchError } from 'redis';

import type { BalanceStore, LeaveBalance } from '@core/interfaces/index.js';

import { redis, type RedisClient } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

function keyFor(employeeId: string): string {
  return `${redisConfig.prefixes.balance}:${employeeId}`;
}

function parseBalance(raw: string | null): LeaveBalance | null {
  if (!raw) return null;
  try {
    return JSON.parse(raw) as LeaveBalance;
  } catch {
    return null;
  }
}

function cloneBalance(balance: LeaveBalance): LeaveBalance {
  return structuredClone(balance);
}

export class RedisBalanceRepository implements BalanceStore {
  constructor(private readonly client: RedisClient = redis) {}

  async readBalance(employeeId: string): Promise<LeaveBalance | null> {
    return parseBalance(await this.client.get(keyFor(employeeId)));
  }

  async casWriteBalance(current: LeaveBalance, next: LeaveBalance): Promise<boolean> {
    const key = keyFor(current.employeeId);
    return this.client.executeIsolated(async (isolated) => {
      await isolated.watch(key);
      const stored = parseBalance(await isolated.get(key));
      if (!stored || stored.version !== current.version) {
        await isolated.unwatch();
        return false;
      }
      try {
        await isolated.multi().set(key, JSON.stringify(next)).exec();
        return true;
      } catch (err) {
        if (err instanceof WatchError) return false;
        throw err;
      }
    });
  }

  /** Writes a balance only when none exists yet. */
  async seedBalance(balance: LeaveBalance): Promise<boolean> {
    const reply = await this.client.set(keyFor(balance.employeeId), JSON.stringify(balance), {
      NX: true,
    });
    return reply === 'OK';
  }
}

export class InMemoryBalanceRepository implements BalanceStore {
  private readonly balances = new Map<string, LeaveBalance>();

  constructor(initial: LeaveBalance[] = []) {
    for (const balance of initial) {
      this.balances.set(balance.employeeId, cloneBalance(balance));
    }
  }

  async readBalance(employeeId: string): Promise<LeaveBalance | null> {
    const stored = this.balances.get(employeeId);
    return stored ? cloneBalance(stored) : null;
  }

  async casWriteBalance(current: LeaveBalance, next: LeaveBalance): Promise<boolean> {
    const stored = this.balances.get(current.employeeId);
    if (!stored || stored.version !== current.version) return false;
    this.balances.set(current.employeeId, cloneBalance(next));
    return true;
  }

  async seedBalance(balance: LeaveBalance): Promise<boolean> {
    if (this.balances.has(balance.employeeId)) return false;
    this.balances.set(balance.employeeId, cloneBalance(balance));
    return true;
  }
}
