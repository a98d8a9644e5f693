import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ResourceType } from "../domain/resourceTypes.js";
import type { RefreshLease } from "../domain/snapshot.js";
import { LeaseUnavailableError } from "./errorCodes.js";

/**
 * At most one live lease per resource type. `acquire` resolves to null when another
 * owner holds the lease; it rejects only when the backend itself failed.
 */
export interface RefreshLeaseStore {
  acquire(resourceType: ResourceType): Promise<RefreshLease | null>;
  /** No-op unless the lease is still held by the same owner token. */
  release(lease: RefreshLease): Promise<void>;
  inspect(resourceType: ResourceType): Promise<RefreshLease | null>;
}

export interface LeaseStoreOptions {
  now?: () => Date;
  tokenFactory?: () => string;
}

/**
 * Process-local leases. They never expire; a crashed process loses them together
 * with everything else it held.
 */
export class InMemoryRefreshLeaseStore implements RefreshLeaseStore {
  private readonly leases = new Map<ResourceType, RefreshLease>();
  private readonly now: () => Date;
  private readonly tokenFactory: () => string;

  constructor(options: LeaseStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.tokenFactory = options.tokenFactory ?? randomUUID;
  }

  async acquire(resourceType: ResourceType): Promise<RefreshLease | null> {
    // Check and set run in the same synchronous turn.
    if (this.leases.has(resourceType)) {
      return null;
    }
    const lease: RefreshLease = {
      resourceType,
      ownerToken: this.tokenFactory(),
      startedAt: this.now(),
      expiresAt: null
    };
    this.leases.set(resourceType, lease);
    return { ...lease };
  }

  async release(lease: RefreshLease): Promise<void> {
    const current = this.leases.get(lease.resourceType);
    if (current && current.ownerToken === lease.ownerToken) {
      this.leases.delete(lease.resourceType);
    }
  }

  async inspect(resourceType: ResourceType): Promise<RefreshLease | null> {
    const current = this.leases.get(resourceType);
    return current ? { ...current } : null;
  }
}

/** The three node-redis commands the Redis lease store issues. */
export interface RedisLeaseCommands {
  set(key: string, value: string, options: { NX: true; PX: number }): Promise<unknown>;
  get(key: string): Promise<string | null>;
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
}

export interface RedisRefreshLeaseStoreOptions extends LeaseStoreOptions {
  ttlMs: number;
  keyPrefix?: string;
}

const RELEASE_SCRIPT = `
local raw = redis.call("GET", KEYS[1])
if not raw then
  return 0
end
local ok, lease = pcall(cjson.decode, raw)
if ok and lease["ownerToken"] == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0`;

const storedLeaseSchema = z.object({
  ownerToken: z.string(),
  startedAt: z.coerce.date(),
  expiresAt: z.coerce.date()
});

/**
 * Cross-process leases backed by SET NX PX. A holder that dies leaves the key to
 * expire after ttlMs, which must exceed the longest expected refresh.
 */
export class RedisRefreshLeaseStore implements RefreshLeaseStore {
  private readonly now: () => Date;
  private readonly tokenFactory: () => string;
  private readonly ttlMs: number;
  private readonly keyPrefix: string;

  constructor(private readonly redis: RedisLeaseCommands, options: RedisRefreshLeaseStoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.tokenFactory = options.tokenFactory ?? randomUUID;
    this.ttlMs = Math.max(1, Math.floor(options.ttlMs));
    this.keyPrefix = options.keyPrefix ?? "cache:refresh-lease:";
  }

  async acquire(resourceType: ResourceType): Promise<RefreshLease | null> {
    const startedAt = this.now();
    const lease: RefreshLease = {
      resourceType,
      ownerToken: this.tokenFactory(),
      startedAt,
      expiresAt: new Date(startedAt.getTime() + this.ttlMs)
    };
    const reply = await this.command("acquire", resourceType, () =>
      this.redis.set(
        this.key(resourceType),
        JSON.stringify({ ownerToken: lease.ownerToken, startedAt, expiresAt: lease.expiresAt }),
        { NX: true, PX: this.ttlMs }
      )
    );
    return reply === "OK" ? lease : null;
  }

  async release(lease: RefreshLease): Promise<void> {
    await this.command("release", lease.resourceType, () =>
      this.redis.eval(RELEASE_SCRIPT, {
        keys: [this.key(lease.resourceType)],
        arguments: [lease.ownerToken]
      })
    );
  }

  async inspect(resourceType: ResourceType): Promise<RefreshLease | null> {
    const raw = await this.command("inspect", resourceType, () => this.redis.get(this.key(resourceType)));
    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      // A foreign value still occupies the key, so the lease is held.
      return { resourceType, ownerToken: "unknown", startedAt: this.now(), expiresAt: null };
    }
    const parsed = storedLeaseSchema.safeParse(decoded);
    if (!parsed.success) {
      return { resourceType, ownerToken: "unknown", startedAt: this.now(), expiresAt: null };
    }
    return { resourceType, ...parsed.data };
  }

  private async command<T>(operation: string, resourceType: ResourceType, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LeaseUnavailableError(`Lease ${operation} failed for ${resourceType}: ${reason}`, {
        operation,
        resourceType
      });
    }
  }

  private key(resourceType: ResourceType): string {
    return `${this.keyPrefix}${resourceType}`;
  }
}
