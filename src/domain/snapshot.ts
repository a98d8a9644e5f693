import type { ResourceRecordMap } from "./records.js";
import type { ResourceType } from "./resourceTypes.js";

export interface Snapshot<T extends ResourceType = ResourceType> {
  resourceType: T;
  records: readonly ResourceRecordMap[T][];
  fetchedAt: Date;
  /** Strictly increasing per resource type; 1 after the first commit. */
  version: number;
  sourceChecksum: string | null;
  recordCount: number;
}

export interface SnapshotFreshness {
  resourceType: ResourceType;
  fetchedAt: Date;
  version: number;
  recordCount: number;
  sourceChecksum: string | null;
}

export interface RefreshLease {
  resourceType: ResourceType;
  ownerToken: string;
  startedAt: Date;
  /** null for leases that live only as long as the process. */
  expiresAt: Date | null;
}

export interface RefreshErrorDetail {
  code: string;
  message: string;
}

export type RefreshOutcome =
  | {
      status: "success";
      resourceType: ResourceType;
      version: number;
      recordCount: number;
      changed: boolean;
      durationMs: number;
    }
  | {
      status: "already_in_progress";
      resourceType: ResourceType;
    }
  | {
      status: "transient_failure" | "permanent_failure";
      resourceType: ResourceType;
      error: RefreshErrorDetail;
      durationMs: number;
    };

export type RefreshOutcomeStatus = RefreshOutcome["status"];

export interface RefreshStatus {
  resourceType: ResourceType;
  lastAttemptAt: Date;
  lastOutcome: Exclude<RefreshOutcomeStatus, "already_in_progress">;
  lastSuccessAt: Date | null;
  lastError: RefreshErrorDetail | null;
  consecutiveFailures: number;
  lastDurationMs: number;
}
