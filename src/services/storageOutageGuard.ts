import { StorageUnavailableError, describeError } from "../models/errorCodes.js";
import { getAppLogger, type AppLogger } from "../logging/logger.js";

const DEFAULT_FAILURE_THRESHOLD = 3;
const DEFAULT_COOLDOWN_MS = 15_000;

export interface StorageOutageGuardOptions {
  failureThreshold?: number;
  /** Fixed retry interval after the guard opens; no backoff is applied. */
  cooldownMs?: number;
  now?: () => Date;
  dependency?: string;
  logger?: AppLogger;
}

export class StorageOutageGuard {
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => Date;
  private readonly dependency: string;
  private readonly logger: AppLogger;

  private failureCount = 0;
  private unavailableUntil: Date | null = null;

  constructor(options: StorageOutageGuardOptions = {}) {
    this.failureThreshold = Math.max(1, options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD);
    this.cooldownMs = Math.max(1_000, options.cooldownMs ?? DEFAULT_COOLDOWN_MS);
    this.now = options.now ?? (() => new Date());
    this.dependency = options.dependency ?? "postgres";
    const rootLogger = options.logger ?? getAppLogger();
    this.logger = rootLogger.child?.({ module: "storageOutageGuard" }) ?? rootLogger;
  }

  assertAvailable(): void {
    if (!this.unavailableUntil) {
      return;
    }

    const now = this.now();
    if (now.getTime() >= this.unavailableUntil.getTime()) {
      this.logger.info?.(
        { dependency: this.dependency, retryAt: this.unavailableUntil.toISOString() },
        "storage.outage_guard.cooldown_expired"
      );
      this.unavailableUntil = null;
      this.failureCount = 0;
      return;
    }

    this.logger.warn?.(
      { dependency: this.dependency, retryAt: this.unavailableUntil.toISOString() },
      "storage.outage_guard.blocked"
    );

    throw new StorageUnavailableError(`${this.dependency} is unavailable`, {
      dependency: this.dependency,
      retryAt: this.unavailableUntil.toISOString()
    });
  }

  recordSuccess(): void {
    if (this.failureCount > 0 || this.unavailableUntil) {
      this.logger.info?.(
        { dependency: this.dependency, failuresBeforeRecovery: this.failureCount },
        "storage.outage_guard.recovered"
      );
    }

    this.failureCount = 0;
    this.unavailableUntil = null;
  }

  recordFailure(error: unknown): void {
    const now = this.now();
    this.failureCount += 1;

    this.logger.warn?.(
      { dependency: this.dependency, failures: this.failureCount, message: describeError(error) },
      "storage.outage_guard.failure"
    );

    if (this.failureCount < this.failureThreshold) {
      return;
    }

    const nextAvailableAt = new Date(now.getTime() + this.cooldownMs);
    if (!this.unavailableUntil || nextAvailableAt.getTime() > this.unavailableUntil.getTime()) {
      this.unavailableUntil = nextAvailableAt;
      this.logger.error?.(
        {
          dependency: this.dependency,
          failureThreshold: this.failureThreshold,
          retryAt: this.unavailableUntil.toISOString()
        },
        "storage.outage_guard.cooldown_engaged"
      );
    }
  }

  isOpen(): boolean {
    return this.unavailableUntil !== null && this.now().getTime() < this.unavailableUntil.getTime();
  }

  /** Runs a storage operation, translating any failure into StorageUnavailableError. */
  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    this.assertAvailable();
    try {
      const result = await work();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(error);
      if (error instanceof StorageUnavailableError) {
        throw error;
      }
      throw new StorageUnavailableError(`${this.dependency} ${operation} failed`, {
        dependency: this.dependency,
        operation,
        cause: describeError(error)
      });
    }
  }
}
