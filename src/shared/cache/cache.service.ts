import { Inject, Injectable } from '@nestjs/common';

/** Injection token for the in-process memory Keyv store. */
export const MEMORY_STORE = Symbol('MEMORY_STORE');

/** Minimal async K/V interface implemented by Keyv. */
export interface KeyvStore {
  get<T>(key: string): Promise<T | undefined>;
  set(key: string, value: unknown, ttl?: number): Promise<boolean | undefined>;
  delete(key: string): Promise<boolean>;
}

/**
 * In-process LRU cache via Keyv/CacheableMemory.
 *
 * TTL parameters are in **seconds** (0 = no expiry).
 */
@Injectable()
export class CacheService {
  constructor(@Inject(MEMORY_STORE) public readonly memory: KeyvStore) {}

  async setMemory<T>(key: string, value: T, ttlSeconds = 0): Promise<void> {
    await this.memory.set(
      key,
      value,
      ttlSeconds ? ttlSeconds * 1_000 : undefined,
    );
  }

  async getMemory<T>(key: string): Promise<T | undefined> {
    return this.memory.get<T>(key);
  }

  async deleteMemory(key: string): Promise<void> {
    await this.memory.delete(key);
  }
}
