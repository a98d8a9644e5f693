// Error catalog for the cache service. Keys are stable; numeric codes are never reused.

export type ErrorCategory = "validation" | "state" | "upstream" | "dependency" | "internal";

type ErrorCatalogDefinitionShape = {
  /** Uppercase key used internally (e.g. SNAPSHOT_NOT_FOUND) */
  key: string;
  /** Stable numeric code string (e.g. E2001) */
  numericCode: string;
  /** Snake_case symbolic reason */
  reason: string;
  category: ErrorCategory;
  /** Whether the caller can retry the request without changes */
  retryable: boolean;
  humanMessage: string;
};

const ERROR_DEFINITIONS = [
  {
    key: "SNAPSHOT_NOT_FOUND",
    numericCode: "E2001",
    reason: "snapshot_not_found",
    category: "state",
    retryable: true,
    humanMessage: "No snapshot has been committed for this resource yet"
  },
  {
    key: "UNKNOWN_RESOURCE_TYPE",
    numericCode: "E2002",
    reason: "unknown_resource_type",
    category: "validation",
    retryable: false,
    humanMessage: "Resource type is not one of the cached resource types"
  },
  {
    key: "INVALID_QUERY",
    numericCode: "E2003",
    reason: "invalid_query",
    category: "validation",
    retryable: false,
    humanMessage: "Query parameters failed validation"
  },
  {
    key: "UPSTREAM_TRANSIENT",
    numericCode: "E2004",
    reason: "upstream_transient",
    category: "upstream",
    retryable: true,
    humanMessage: "Upstream source was temporarily unavailable"
  },
  {
    key: "UPSTREAM_PERMANENT",
    numericCode: "E2005",
    reason: "upstream_permanent",
    category: "upstream",
    retryable: false,
    humanMessage: "Upstream source rejected the request; configuration needs attention"
  },
  {
    key: "STORAGE_UNAVAILABLE",
    numericCode: "E2006",
    reason: "storage_unavailable",
    category: "dependency",
    retryable: true,
    humanMessage: "Snapshot storage could not be reached"
  },
  {
    key: "LEASE_UNAVAILABLE",
    numericCode: "E2007",
    reason: "lease_unavailable",
    category: "dependency",
    retryable: true,
    humanMessage: "Refresh lease backend could not be reached"
  },
  {
    key: "MEMBER_NOT_FOUND",
    numericCode: "E2008",
    reason: "member_not_found",
    category: "state",
    retryable: false,
    humanMessage: "Member is neither in the team directory nor assigned a cached todo"
  },
  {
    key: "INTERNAL_ERROR",
    numericCode: "E2010",
    reason: "internal_error",
    category: "internal",
    retryable: true,
    humanMessage: "Generic unexpected failure"
  }
] as const satisfies readonly ErrorCatalogDefinitionShape[];

export type ErrorDefinition = (typeof ERROR_DEFINITIONS)[number];
export type ErrorCodeKey = ErrorDefinition["key"];
export type ErrorReason = ErrorDefinition["reason"];

const NUMERIC_PATTERN = /^E(\d{4})$/u;

function parseNumericCode(numericCode: string): number {
  const match = NUMERIC_PATTERN.exec(numericCode);
  if (!match) {
    throw new Error(`Invalid numeric code format: ${numericCode}`);
  }
  return Number.parseInt(match[1], 10);
}

const DEFINITIONS_BY_KEY = new Map<ErrorCodeKey, ErrorDefinition>();
const DEFINITIONS_BY_NUMERIC = new Map<number, ErrorDefinition>();

for (const definition of ERROR_DEFINITIONS) {
  DEFINITIONS_BY_KEY.set(definition.key, definition);
  DEFINITIONS_BY_NUMERIC.set(parseNumericCode(definition.numericCode), definition);
}

export interface ErrorCatalogEntry {
  numericCode: string;
  reason: ErrorReason;
  category: ErrorCategory;
  retryable: boolean;
  humanMessage: string;
}

export interface ErrorResponseBody extends ErrorCatalogEntry {
  details?: unknown;
}

export class ErrorCodeRegistry {
  static listDefinitions(): readonly ErrorDefinition[] {
    return ERROR_DEFINITIONS;
  }

  static getDefinitionByKey(key: ErrorCodeKey): ErrorDefinition {
    const definition = DEFINITIONS_BY_KEY.get(key);
    if (!definition) {
      throw new Error(`Unknown error code key: ${key}`);
    }
    return { ...definition };
  }

  static getDefinitionByNumericCode(code: number | string): ErrorDefinition | undefined {
    const numeric = typeof code === "string" ? parseNumericCode(code) : code;
    const definition = DEFINITIONS_BY_NUMERIC.get(numeric);
    return definition ? { ...definition } : undefined;
  }

  static verifyCodeUniqueness(): boolean {
    return DEFINITIONS_BY_NUMERIC.size === ERROR_DEFINITIONS.length;
  }
}

export function mapDefinitionToEntry(definition: ErrorDefinition): ErrorCatalogEntry {
  const { numericCode, reason, category, retryable, humanMessage } = definition;
  return { numericCode, reason, category, retryable, humanMessage };
}

export class CacheServiceError extends Error {
  public readonly definition: ErrorDefinition;

  constructor(
    public readonly code: ErrorCodeKey,
    public readonly details?: unknown,
    message?: string
  ) {
    const definition = ErrorCodeRegistry.getDefinitionByKey(code);
    super(message ?? definition.humanMessage);
    this.definition = definition;
    this.name = "CacheServiceError";
  }

  toResponseBody(): ErrorResponseBody {
    return { ...mapDefinitionToEntry(this.definition), details: this.details };
  }
}

export interface UpstreamErrorDetails {
  /** Machine-readable cause, e.g. rate_limited or missing_credential. */
  cause: string;
  httpStatus?: number;
  retryAfterSeconds?: number;
}

export class TransientFetchError extends CacheServiceError {
  readonly kind = "transient" as const;

  constructor(message: string, public readonly upstream: UpstreamErrorDetails) {
    super("UPSTREAM_TRANSIENT", upstream, message);
    this.name = "TransientFetchError";
  }
}

export class PermanentFetchError extends CacheServiceError {
  readonly kind = "permanent" as const;

  constructor(message: string, public readonly upstream: UpstreamErrorDetails) {
    super("UPSTREAM_PERMANENT", upstream, message);
    this.name = "PermanentFetchError";
  }
}

export type UpstreamFetchError = TransientFetchError | PermanentFetchError;

export class StorageUnavailableError extends CacheServiceError {
  constructor(message: string, details?: unknown) {
    super("STORAGE_UNAVAILABLE", details, message);
    this.name = "StorageUnavailableError";
  }
}

export class LeaseUnavailableError extends CacheServiceError {
  constructor(message: string, details?: unknown) {
    super("LEASE_UNAVAILABLE", details, message);
    this.name = "LeaseUnavailableError";
  }
}

export class SnapshotNotFoundError extends CacheServiceError {
  constructor(resourceType: string) {
    super("SNAPSHOT_NOT_FOUND", { resourceType });
    this.name = "SnapshotNotFoundError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof CacheServiceError) {
    return `${error.code}:${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
