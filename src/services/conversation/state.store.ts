import { WatchError } from 'redis';

import type { SessionStore } from '@core/interfaces/index.js';

import { redis, type RedisClient } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

import type { ConversationSession } from './state.types.js';

function keyFor(sessionId: string): string {
  return `${redisConfig.prefixes.conversation}:${sessionId.trim()}`;
}

function safeParse(raw: string | null): ConversationSession | null {
  if (!raw) return null;
  try {
    return JSON.parse(raw) as ConversationSession;
  } catch {
    return null;
  }
}

function assertNextVersion(next: ConversationSession, expectedVersion: number | null): void {
  const expectedNext = (expectedVersion ?? 0) + 1;
  if (next.version !== expectedNext) {
    throw new Error(
      `Invalid session version: expected next version ${expectedNext}, received ${next.version}`,
    );
  }
}

export class RedisSessionStore implements SessionStore<ConversationSession> {
  constructor(
    private readonly client: RedisClient = redis,
    private readonly ttlSeconds: number = redisConfig.sessionTtlSeconds,
  ) {}

  async get(sessionId: string): Promise<ConversationSession | null> {
    return safeParse(await this.client.get(keyFor(sessionId)));
  }

  async save(next: ConversationSession, expectedVersion: number | null): Promise<boolean> {
    assertNextVersion(next, expectedVersion);
    const key = keyFor(next.id);

    return this.client.executeIsolated(async (isolated) => {
      await isolated.watch(key);
      const current = safeParse(await isolated.get(key));
      const currentVersion = current?.version ?? null;
      if (currentVersion !== expectedVersion) {
        await isolated.unwatch();
        return false;
      }
      try {
        await isolated.multi().set(key, JSON.stringify(next), { EX: this.ttlSeconds }).exec();
        return true;
      } catch (err) {
        if (err instanceof WatchError) return false;
        throw err;
      }
    });
  }

  async delete(sessionId: string): Promise<void> {
    await this.client.del(keyFor(sessionId));
  }
}

export class InMemorySessionStore implements SessionStore<ConversationSession> {
  private readonly sessions = new Map<string, ConversationSession>();

  async get(sessionId: string): Promise<ConversationSession | null> {
    const found = this.sessions.get(sessionId.trim());
    return found ? structuredClone(found) : null;
  }

  async save(next: ConversationSession, expectedVersion: number | null): Promise<boolean> {
    assertNextVersion(next, expectedVersion);
    const key = next.id.trim();
    const currentVersion = this.sessions.get(key)?.version ?? null;
    if (currentVersion !== expectedVersion) return false;
    this.sessions.set(key, structuredClone(next));
    return true;
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId.trim());
  }
}
