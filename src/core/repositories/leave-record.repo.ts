import type { LeaveRecordStore, LeaveRequest, LeaveRequestStatus } from '@core/interfaces/index.js';

import { redis, type RedisClient } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

// One hash per employee: field = request id, value = JSON record.
function keyFor(employeeId: string): string {
  return `${redisConfig.prefixes.leave}:${employeeId}`;
}

function parseRecord(raw: string | null | undefined): LeaveRequest | null {
  if (!raw) return null;
  try {
    return JSON.parse(raw) as LeaveRequest;
  } catch {
    return null;
  }
}

export class RedisLeaveRecordRepository implements LeaveRecordStore {
  constructor(private readonly client: RedisClient = redis) {}

  async insert(request: LeaveRequest): Promise<boolean> {
    return this.client.hSetNX(keyFor(request.employeeId), request.id, JSON.stringify(request));
  }

  async updateStatus(employeeId: string, id: string, status: LeaveRequestStatus): Promise<void> {
    const existing = await this.findById(employeeId, id);
    if (!existing) return;
    await this.client.hSet(keyFor(employeeId), id, JSON.stringify({ ...existing, status }));
  }

  async remove(employeeId: string, id: string): Promise<void> {
    await this.client.hDel(keyFor(employeeId), id);
  }

  async findById(employeeId: string, id: string): Promise<LeaveRequest | null> {
    return parseRecord(await this.client.hGet(keyFor(employeeId), id));
  }

  async findByEmployee(employeeId: string): Promise<LeaveRequest[]> {
    const values = await this.client.hVals(keyFor(employeeId));
    return values.map(parseRecord).filter((r): r is LeaveRequest => r !== null);
  }
}

export class InMemoryLeaveRecordRepository implements LeaveRecordStore {
  private readonly records = new Map<string, Map<string, LeaveRequest>>();

  private bucket(employeeId: string): Map<string, LeaveRequest> {
    let bucket = this.records.get(employeeId);
    if (!bucket) {
      bucket = new Map();
      this.records.set(employeeId, bucket);
    }
    return bucket;
  }

  async insert(request: LeaveRequest): Promise<boolean> {
    const bucket = this.bucket(request.employeeId);
    if (bucket.has(request.id)) return false;
    bucket.set(request.id, { ...request });
    return true;
  }

  async updateStatus(employeeId: string, id: string, status: LeaveRequestStatus): Promise<void> {
    const bucket = this.bucket(employeeId);
    const existing = bucket.get(id);
    if (existing) bucket.set(id, { ...existing, status });
  }

  async remove(employeeId: string, id: string): Promise<void> {
    this.bucket(employeeId).delete(id);
  }

  async findById(employeeId: string, id: string): Promise<LeaveRequest | null> {
    const found = this.records.get(employeeId)?.get(id);
    return found ? { ...found } : null;
  }

  async findByEmployee(employeeId: string): Promise<LeaveRequest[]> {
    return [...(this.records.get(employeeId)?.values() ?? [])].map((r) => ({ ...r }));
  }
}
