import { beforeEach, describe, expect, it } from 'vitest';

import type { LeaveBalance, LeaveRequest } from '@core/interfaces/index.js';
import { RedisBalanceRepository } from '@core/repositories/balance.repo.js';
import { RedisLeaveRecordRepository } from '@core/repositories/leave-record.repo.js';

import { createSession } from '@services/conversation/state-machine.js';
import { RedisSessionStore } from '@services/conversation/state.store.js';

import { seedLedger } from '@infra/seed.js';

import { FakeRedis } from '@test/utils/fakeRedis.js';

const AT = '2024-01-01T04:30:00.000Z';

describe('RedisSessionStore', () => {
  let fake: FakeRedis;
  let store: RedisSessionStore;

  beforeEach(() => {
    fake = new FakeRedis();
    store = new RedisSessionStore(fake.asClient(), 3600);
  });

  it('creates, reads and advances a session by version', async () => {
    const first = { ...createSession('s1', AT, 30), version: 1 };
    expect(await store.save(first, null)).toBe(true);
    expect(await store.get('s1')).toEqual(first);
    expect(fake.ttls.get('conv:s1')).toBe(3600);

    expect(await store.save(first, null)).toBe(false);
    expect(await store.save({ ...first, turn: 1, version: 2 }, 1)).toBe(true);
    expect(await store.get('s1')).toMatchObject({ turn: 1, version: 2 });
  });

  it('refuses a next version that does not follow the expected one', async () => {
    const session = { ...createSession('s1', AT, 30), version: 3 };
    await expect(store.save(session, null)).rejects.toThrow(
      'Invalid session version: expected next version 1, received 3',
    );
  });

  it('loses the write when another client changes the key after WATCH', async () => {
    const first = { ...createSession('s1', AT, 30), version: 1 };
    await store.save(first, null);

    fake.beforeExec = () => fake.simulateWrite('conv:s1', JSON.stringify({ ...first, version: 2 }));
    expect(await store.save({ ...first, version: 2 }, 1)).toBe(false);
  });

  it('deletes sessions', async () => {
    await store.save({ ...createSession('s1', AT, 30), version: 1 }, null);
    await store.delete('s1');
    expect(await store.get('s1')).toBeNull();
  });
});

describe('RedisBalanceRepository', () => {
  const balance: LeaveBalance = {
    employeeId: '10001',
    balances: { casual: { entitled: 12, used: 0, pending: 0 } },
    version: 0,
  };

  it('seeds once and writes only over the expected version', async () => {
    const fake = new FakeRedis();
    const repo = new RedisBalanceRepository(fake.asClient());

    expect(await repo.seedBalance(balance)).toBe(true);
    expect(await repo.seedBalance({ ...balance, version: 9 })).toBe(false);

    const next: LeaveBalance = {
      ...balance,
      balances: { casual: { entitled: 12, used: 0, pending: 2 } },
      version: 1,
    };
    expect(await repo.casWriteBalance(balance, next)).toBe(true);
    expect(await repo.readBalance('10001')).toEqual(next);
    expect(await repo.casWriteBalance(balance, { ...next, version: 1 })).toBe(false);
  });

  it('refuses to write a balance that was never seeded', async () => {
    const repo = new RedisBalanceRepository(new FakeRedis().asClient());
    expect(await repo.casWriteBalance(balance, { ...balance, version: 1 })).toBe(false);
  });

  it('seeds the ledger without overwriting existing balances', async () => {
    const fake = new FakeRedis();
    const repo = new RedisBalanceRepository(fake.asClient());
    await repo.seedBalance({ ...balance, version: 5 });

    const written = await seedLedger(repo, {
      employees: [
        { employeeId: '10001', name: 'Meera Iyer', balances: { casual: 12 } },
        { employeeId: '10002', name: 'Arjun Mehta', balances: { Casual: 10, sick: 6 } },
      ],
    });

    expect(written).toBe(1);
    expect(await repo.readBalance('10001')).toMatchObject({ version: 5 });
    expect(await repo.readBalance('10002')).toEqual({
      employeeId: '10002',
      balances: {
        casual: { entitled: 10, used: 0, pending: 0 },
        sick: { entitled: 6, used: 0, pending: 0 },
      },
      version: 0,
    });
  });
});

describe('RedisLeaveRecordRepository', () => {
  const record: LeaveRequest = {
    id: 'req-1',
    employeeId: '10001',
    leaveType: 'casual',
    startDate: '2024-01-08',
    endDate: '2024-01-10',
    dayCount: 3,
    status: 'Validated',
    createdAt: AT,
  };

  it('stores records per employee and updates their status', async () => {
    const repo = new RedisLeaveRecordRepository(new FakeRedis().asClient());

    expect(await repo.insert(record)).toBe(true);
    expect(await repo.insert({ ...record, dayCount: 9 })).toBe(false);
    await repo.updateStatus('10001', 'req-1', 'Committed');

    expect(await repo.findById('10001', 'req-1')).toEqual({ ...record, status: 'Committed' });
    expect(await repo.findByEmployee('10001')).toEqual([{ ...record, status: 'Committed' }]);
    expect(await repo.findByEmployee('10002')).toEqual([]);

    await repo.remove('10001', 'req-1');
    expect(await repo.findById('10001', 'req-1')).toBeNull();
  });
});
