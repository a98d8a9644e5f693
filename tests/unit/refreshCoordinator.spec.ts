import { beforeEach, describe, expect, it } from "vitest";
import { resetMetrics } from "../../src/infra/metrics.js";
import {
  LeaseUnavailableError,
  PermanentFetchError,
  StorageUnavailableError,
  TransientFetchError
} from "../../src/models/errorCodes.js";
import { InMemoryRefreshLeaseStore, type RefreshLeaseStore } from "../../src/models/refreshLease.js";
import {
  InMemoryRefreshStatusRepository,
  PostgresRefreshStatusRepository
} from "../../src/models/refreshStatusRepository.js";
import { InMemorySnapshotStore, PostgresSnapshotStore, type SnapshotStore } from "../../src/models/snapshotStore.js";
import { MetricsService } from "../../src/services/metricsService.js";
import { RefreshCoordinator } from "../../src/services/refreshCoordinator.js";
import { StorageOutageGuard } from "../../src/services/storageOutageGuard.js";
import {
  ControlledFetcher,
  FakeSqlClient,
  ScriptedFetcher,
  createClock,
  createRecordingLogger,
  makeMember,
  makeProjects,
  makeTask,
  until,
  type RecordingLogger
} from "../helpers/fakes.js";

const transient = () => new TransientFetchError("upstream unavailable", { cause: "upstream_unavailable", httpStatus: 503 });
const permanent = () => new PermanentFetchError("credential rejected", { cause: "unauthorized", httpStatus: 401 });

describe("RefreshCoordinator", () => {
  let clock: ReturnType<typeof createClock>;
  let store: InMemorySnapshotStore;
  let leases: InMemoryRefreshLeaseStore;
  let statuses: InMemoryRefreshStatusRepository;
  let metrics: MetricsService;
  let logger: RecordingLogger;

  beforeEach(() => {
    resetMetrics();
    clock = createClock("2025-03-03T10:00:00.000Z");
    store = new InMemorySnapshotStore({ now: clock.now });
    leases = new InMemoryRefreshLeaseStore({ now: clock.now });
    statuses = new InMemoryRefreshStatusRepository();
    metrics = new MetricsService();
    logger = createRecordingLogger();
  });

  function coordinatorWith(
    fetcher: ScriptedFetcher | ControlledFetcher,
    overrides: { store?: SnapshotStore; leases?: RefreshLeaseStore } = {}
  ): RefreshCoordinator {
    return new RefreshCoordinator(
      {
        store: overrides.store ?? store,
        fetcher,
        leases: overrides.leases ?? leases,
        statuses,
        metrics,
        logger,
        now: clock.now
      },
      { permanentFailureAlertThreshold: 3 }
    );
  }

  it("commits the fetched records as version 1 and coalesces a concurrent trigger", async () => {
    const fetcher = new ControlledFetcher();
    const coordinator = coordinatorWith(fetcher);

    const first = coordinator.refresh("projects");
    const second = await coordinator.refresh("projects");

    expect(second).toEqual({ status: "already_in_progress", resourceType: "projects" });

    await until(() => fetcher.pendingCount("projects") === 1);
    fetcher.succeed("projects", makeProjects(12));

    expect(await first).toEqual({
      status: "success",
      resourceType: "projects",
      version: 1,
      recordCount: 12,
      changed: true,
      durationMs: 0
    });
    expect(fetcher.calls).toEqual(["projects"]);
    expect(fetcher.maxInFlight.get("projects")).toBe(1);

    const snapshot = await store.get("projects");
    expect(snapshot?.version).toBe(1);
    expect(snapshot?.records).toHaveLength(12);
    expect(snapshot?.fetchedAt.toISOString()).toBe("2025-03-03T10:00:00.000Z");
    expect(await leases.inspect("projects")).toBeNull();
    expect(logger.messages("info")).toEqual(["refresh.already_in_progress", "refresh.success"]);
  });

  it("keeps the previous snapshot when a later fetch fails", async () => {
    const fetcher = new ScriptedFetcher()
      .enqueue("projects", { ok: true, records: makeProjects(2), pages: 1 })
      .enqueue("projects", { ok: false, error: transient() });
    const coordinator = coordinatorWith(fetcher);

    await coordinator.refresh("projects");
    const outcome = await coordinator.refresh("projects");

    expect(outcome).toEqual({
      status: "transient_failure",
      resourceType: "projects",
      error: { code: "UPSTREAM_TRANSIENT", message: "upstream unavailable" },
      durationMs: 0
    });
    const snapshot = await store.get("projects");
    expect(snapshot?.version).toBe(1);
    expect(snapshot?.records.map((record) => record.pageId)).toEqual(["project-1", "project-2"]);
    expect(await leases.inspect("projects")).toBeNull();
  });

  it("reports permanent failures and still releases the lease", async () => {
    const fetcher = new ScriptedFetcher().enqueue("tasks", { ok: false, error: permanent() });

    const outcome = await coordinatorWith(fetcher).refresh("tasks");

    expect(outcome.status).toBe("permanent_failure");
    expect(outcome.status !== "success" && outcome.status !== "already_in_progress" && outcome.error).toEqual({
      code: "UPSTREAM_PERMANENT",
      message: "credential rejected"
    });
    expect(await store.get("tasks")).toBeNull();
    expect(await leases.inspect("tasks")).toBeNull();
  });

  it("advances the version but flags unchanged content", async () => {
    const fetcher = new ScriptedFetcher()
      .enqueue("tasks", { ok: true, records: [makeTask()], pages: 1 })
      .enqueue("tasks", { ok: true, records: [makeTask()], pages: 1 })
      .enqueue("tasks", { ok: true, records: [makeTask({ status: "Done" })], pages: 1 });
    const coordinator = coordinatorWith(fetcher);

    const first = await coordinator.refresh("tasks");
    const second = await coordinator.refresh("tasks");
    const third = await coordinator.refresh("tasks");

    expect(first).toMatchObject({ status: "success", version: 1, changed: true });
    expect(second).toMatchObject({ status: "success", version: 2, changed: false });
    expect(third).toMatchObject({ status: "success", version: 3, changed: true });
  });

  it("treats an unreachable lease backend as a transient failure without fetching", async () => {
    const fetcher = new ScriptedFetcher();
    const brokenLeases: RefreshLeaseStore = {
      acquire: async () => {
        throw new LeaseUnavailableError("redis down");
      },
      release: async () => undefined,
      inspect: async () => null
    };

    const outcome = await coordinatorWith(fetcher, { leases: brokenLeases }).refresh("todos");

    expect(outcome).toMatchObject({
      status: "transient_failure",
      error: { code: "LEASE_UNAVAILABLE", message: "LEASE_UNAVAILABLE:redis down" }
    });
    expect(fetcher.calls).toEqual([]);
    expect(logger.messages("error")).toContain("refresh.lease_unavailable");
  });

  it("keeps a successful outcome when releasing the lease fails", async () => {
    const fetcher = new ScriptedFetcher().enqueue("projects", { ok: true, records: makeProjects(1), pages: 1 });
    const flakyLeases: RefreshLeaseStore = {
      acquire: (resourceType) => leases.acquire(resourceType),
      release: async () => {
        throw new Error("connection reset");
      },
      inspect: (resourceType) => leases.inspect(resourceType)
    };

    const outcome = await coordinatorWith(fetcher, { leases: flakyLeases }).refresh("projects");

    expect(outcome.status).toBe("success");
    expect(logger.messages("warn")).toEqual(["refresh.lease_release_failed"]);
  });

  it("turns a crashing fetcher into a transient failure", async () => {
    const outcome = await coordinatorWith(new ScriptedFetcher()).refresh("tasks");

    expect(outcome).toMatchObject({
      status: "transient_failure",
      error: { code: "INTERNAL_ERROR", message: "No scripted result for tasks" }
    });
    expect(await leases.inspect("tasks")).toBeNull();
  });

  it("treats a failed commit as transient and leaves storage untouched", async () => {
    const fetcher = new ScriptedFetcher().enqueue("projects", { ok: true, records: makeProjects(3), pages: 1 });
    const failingStore: SnapshotStore = {
      get: (resourceType) => store.get(resourceType),
      freshnessOf: (resourceType) => store.freshnessOf(resourceType),
      commit: async () => {
        throw new StorageUnavailableError("postgres commit failed");
      }
    };

    const outcome = await coordinatorWith(fetcher, { store: failingStore }).refresh("projects");

    expect(outcome).toMatchObject({
      status: "transient_failure",
      error: { code: "STORAGE_UNAVAILABLE", message: "postgres commit failed" }
    });
    expect(await store.get("projects")).toBeNull();
    expect(logger.messages("error")).toEqual(["refresh.commit_failed"]);
  });

  it("tracks consecutive failures per kind and escalates repeated permanent failures", async () => {
    const fetcher = new ScriptedFetcher()
      .enqueue("todos", { ok: false, error: permanent() })
      .enqueue("todos", { ok: false, error: permanent() })
      .enqueue("todos", { ok: false, error: permanent() })
      .enqueue("todos", { ok: false, error: transient() })
      .enqueue("todos", { ok: true, records: [], pages: 1 });
    const coordinator = coordinatorWith(fetcher);

    await coordinator.refresh("todos");
    await coordinator.refresh("todos");
    expect(logger.messages("error")).toEqual([]);

    await coordinator.refresh("todos");
    expect((await statuses.get("todos"))?.consecutiveFailures).toBe(3);
    expect(logger.messages("error")).toEqual(["refresh.permanent_failure_escalated"]);

    await coordinator.refresh("todos");
    expect(await statuses.get("todos")).toMatchObject({
      lastOutcome: "transient_failure",
      consecutiveFailures: 1,
      lastSuccessAt: null,
      lastError: { code: "UPSTREAM_TRANSIENT", message: "upstream unavailable" }
    });

    clock.advance(60_000);
    await coordinator.refresh("todos");
    const status = await statuses.get("todos");
    expect(status).toMatchObject({ lastOutcome: "success", consecutiveFailures: 0, lastError: null });
    expect(status?.lastSuccessAt?.toISOString()).toBe("2025-03-03T10:01:00.000Z");
  });

  it("refreshes every type independently", async () => {
    const fetcher = new ScriptedFetcher()
      .enqueue("projects", { ok: false, error: permanent() })
      .enqueue("tasks", { ok: true, records: [makeTask()], pages: 1 })
      .enqueue("todos", { ok: false, error: transient() })
      .enqueue("members", { ok: true, records: [makeMember()], pages: 1 });

    const outcomes = await coordinatorWith(fetcher).refreshAll();

    expect(outcomes.map((outcome) => [outcome.resourceType, outcome.status])).toEqual([
      ["projects", "permanent_failure"],
      ["tasks", "success"],
      ["todos", "transient_failure"],
      ["members", "success"]
    ]);
    expect((await store.get("tasks"))?.version).toBe(1);
    expect((await store.get("members"))?.records.map((member) => member.name)).toEqual(["Dana Lee"]);
  });

  it("lets exactly one of several simultaneous triggers fetch", async () => {
    const fetcher = new ControlledFetcher();
    const coordinator = coordinatorWith(fetcher);

    const triggers = Array.from({ length: 6 }, () => coordinator.refresh("projects"));
    await until(() => fetcher.pendingCount("projects") === 1);
    fetcher.succeed("projects", makeProjects(3));
    const outcomes = await Promise.all(triggers);

    expect(outcomes.map((outcome) => outcome.status)).toEqual([
      "success",
      "already_in_progress",
      "already_in_progress",
      "already_in_progress",
      "already_in_progress",
      "already_in_progress"
    ]);
    expect(fetcher.calls).toEqual(["projects"]);
    expect(fetcher.maxInFlight.get("projects")).toBe(1);
    expect((await store.get("projects"))?.version).toBe(1);
    expect(metrics.getSnapshot().projects.outcomes.already_in_progress).toBe(5);
  });

  it("charges every failed storage operation of an attempt to the shared outage guard", async () => {
    const client = new FakeSqlClient(() => new Error("connection refused"));
    const guard = new StorageOutageGuard({ dependency: "postgres", logger, now: clock.now });
    const fetcher = new ScriptedFetcher()
      .enqueue("projects", { ok: true, records: makeProjects(1), pages: 1 })
      .enqueue("projects", { ok: true, records: makeProjects(1), pages: 1 });
    const coordinator = new RefreshCoordinator({
      store: new PostgresSnapshotStore(client, { now: clock.now, guard }),
      statuses: new PostgresRefreshStatusRepository(client, guard),
      fetcher,
      leases,
      metrics,
      logger,
      now: clock.now
    });

    const first = await coordinator.refresh("projects");
    // The snapshot freshness read and the status read each fail once.
    expect(client.queries).toHaveLength(2);
    expect(guard.isOpen()).toBe(false);

    const second = await coordinator.refresh("projects");
    // The third failure opens the guard, so the status read never reaches the database.
    expect(client.queries).toHaveLength(3);
    expect(guard.isOpen()).toBe(true);

    for (const outcome of [first, second]) {
      expect(outcome).toMatchObject({
        status: "transient_failure",
        error: { code: "STORAGE_UNAVAILABLE", message: "postgres snapshot.freshness failed" }
      });
    }
    expect(logger.messages("error")).toContain("storage.outage_guard.cooldown_engaged");
  });

  it("records outcome metrics", async () => {
    const fetcher = new ControlledFetcher();
    const coordinator = coordinatorWith(fetcher);

    const pending = coordinator.refresh("projects");
    await coordinator.refresh("projects");
    await until(() => fetcher.pendingCount("projects") === 1);
    fetcher.succeed("projects", makeProjects(5));
    await pending;

    const snapshot = metrics.getSnapshot().projects;
    expect(snapshot.outcomes).toEqual({
      success: 1,
      already_in_progress: 1,
      transient_failure: 0,
      permanent_failure: 0
    });
    expect(snapshot.recordCount).toBe(5);
    expect(snapshot.snapshotVersion).toBe(1);
    expect(snapshot.refreshDurationMs.samples).toBe(1);
  });
});
