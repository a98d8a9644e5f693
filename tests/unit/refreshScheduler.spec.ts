import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ResourceType } from "../../src/domain/resourceTypes.js";
import type { RefreshOutcome } from "../../src/domain/snapshot.js";
import { RefreshScheduler, type RefreshTrigger } from "../../src/application/jobs/refreshScheduler.js";
import { resetMetrics } from "../../src/infra/metrics.js";
import { InMemoryRefreshLeaseStore } from "../../src/models/refreshLease.js";
import { InMemorySnapshotStore } from "../../src/models/snapshotStore.js";
import { MetricsService } from "../../src/services/metricsService.js";
import { RefreshCoordinator } from "../../src/services/refreshCoordinator.js";
import {
  ControlledFetcher,
  createRecordingLogger,
  deferred,
  makeMember,
  makeProjects,
  makeTask,
  makeTodo,
  until
} from "../helpers/fakes.js";

const INTERVAL = 60_000;

function successFor(resourceType: ResourceType): RefreshOutcome {
  return { status: "success", resourceType, version: 1, recordCount: 0, changed: true, durationMs: 0 };
}

describe("RefreshScheduler", () => {
  beforeEach(() => {
    resetMetrics();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires every type on start and again on each interval until stopped", async () => {
    const refresh = vi.fn(async (resourceType: ResourceType) => successFor(resourceType));
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: INTERVAL }, { logger: createRecordingLogger() });

    scheduler.start();
    expect(refresh.mock.calls.map(([type]) => type)).toEqual(["projects", "tasks", "todos", "members"]);
    expect(scheduler.isScheduled()).toBe(true);

    await vi.advanceTimersByTimeAsync(INTERVAL);
    expect(refresh).toHaveBeenCalledTimes(8);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(INTERVAL * 3);
    expect(refresh).toHaveBeenCalledTimes(8);
    expect(scheduler.isScheduled()).toBe(false);
    expect(scheduler.getStats().tasks).toMatchObject({ ticks: 2, skipped: 0, lastOutcome: "success" });
  });

  it("waits for the first interval when runOnStart is off", async () => {
    const refresh = vi.fn(async (resourceType: ResourceType) => successFor(resourceType));
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: INTERVAL, runOnStart: false });

    scheduler.start();
    expect(refresh).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(INTERVAL);
    expect(refresh).toHaveBeenCalledTimes(4);
    scheduler.stop();
  });

  it("does nothing when disabled", async () => {
    const refresh = vi.fn(async (resourceType: ResourceType) => successFor(resourceType));
    const logger = createRecordingLogger();
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: INTERVAL, enabled: false }, { logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(INTERVAL * 2);

    expect(refresh).not.toHaveBeenCalled();
    expect(scheduler.isScheduled()).toBe(false);
    expect(logger.messages("info")).toEqual(["scheduler.disabled"]);
  });

  it("drops ticks that meet a refresh still in flight", async () => {
    const fetcher = new ControlledFetcher();
    const metrics = new MetricsService();
    const logger = createRecordingLogger();
    const coordinator = new RefreshCoordinator({
      store: new InMemorySnapshotStore(),
      fetcher,
      leases: new InMemoryRefreshLeaseStore(),
      metrics,
      logger
    });
    const scheduler = new RefreshScheduler(coordinator, { intervalMs: INTERVAL }, { logger, metrics });

    scheduler.start();
    await until(() => fetcher.calls.length === 4);

    await vi.advanceTimersByTimeAsync(INTERVAL);
    await until(() => scheduler.getStats().projects.skipped === 1);

    expect(fetcher.calls).toEqual(["projects", "tasks", "todos", "members"]);
    expect(scheduler.getStats().projects).toMatchObject({ ticks: 2, skipped: 1, lastOutcome: "already_in_progress" });
    expect(metrics.getSnapshot().projects.schedulerTicksSkipped).toBe(1);
    expect(logger.messages("info").filter((message) => message === "scheduler.tick_skipped")).toHaveLength(4);

    fetcher.succeed("projects", makeProjects(2));
    fetcher.succeed("tasks", [makeTask()]);
    fetcher.succeed("todos", [makeTodo()]);
    fetcher.succeed("members", [makeMember()]);
    await until(() => scheduler.getStats().members.lastOutcome === "success");

    await vi.advanceTimersByTimeAsync(INTERVAL);
    await until(() => fetcher.calls.length === 8);
    expect(fetcher.maxInFlight.get("projects")).toBe(1);
    scheduler.stop();
  });

  it("lets a fast type keep refreshing while a slow one is stuck", async () => {
    const stuck = deferred<RefreshOutcome>();
    const refresh = vi.fn(async (resourceType: ResourceType): Promise<RefreshOutcome> =>
      resourceType === "projects" ? stuck.promise : successFor(resourceType)
    );
    const trigger: RefreshTrigger = { refresh };
    const scheduler = new RefreshScheduler(trigger, { intervalMs: INTERVAL });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(INTERVAL * 2);

    const stats = scheduler.getStats();
    expect(stats.tasks).toMatchObject({ ticks: 3, lastOutcome: "success" });
    expect(stats.todos).toMatchObject({ ticks: 3, lastOutcome: "success" });
    expect(stats.members).toMatchObject({ ticks: 3, lastOutcome: "success" });
    expect(stats.projects.ticks).toBe(3);
    expect(stats.projects.lastOutcome).toBeUndefined();

    stuck.resolve(successFor("projects"));
    scheduler.stop();
  });

  it("logs a tick whose trigger rejects and keeps the timer alive", async () => {
    const refresh = vi.fn(async (): Promise<RefreshOutcome> => {
      throw new Error("boom");
    });
    const logger = createRecordingLogger();
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: INTERVAL }, { logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(INTERVAL);

    expect(logger.messages("error").filter((message) => message === "scheduler.tick_failed")).toHaveLength(8);
    expect(scheduler.isScheduled()).toBe(true);
    scheduler.stop();
  });

  it("rejects intervals shorter than a second", () => {
    expect(() => new RefreshScheduler({ refresh: vi.fn() }, { intervalMs: 500 })).toThrow();
  });

  it("ignores a second start", () => {
    const refresh = vi.fn(async (resourceType: ResourceType) => successFor(resourceType));
    const logger = createRecordingLogger();
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: INTERVAL }, { logger });

    scheduler.start();
    scheduler.start();

    expect(refresh).toHaveBeenCalledTimes(4);
    expect(logger.messages("warn")).toEqual(["scheduler.already_running"]);
    scheduler.stop();
  });
});
