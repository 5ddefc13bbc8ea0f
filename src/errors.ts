import { pick } from "./services/fixtures/guards.js";

export type FetchErrorReason = "unavailable" | "malformed" | "not_found";
export type NormalizationErrorReason = "missing_timestamp" | "unmappable_entry";
export type SyncErrorReason = "auth_failure" | "provider_unavailable" | "per_event_failure";
export type StoreErrorReason = "io_failure" | "corrupt_document";

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly reason: FetchErrorReason,
    public readonly causes: unknown[] = []
  ) {
    super(message, causes.length > 0 ? { cause: causes[causes.length - 1] } : undefined);
    this.name = "FetchError";
  }
}

export class NormalizationError extends Error {
  constructor(message: string, public readonly reason: NormalizationErrorReason) {
    super(message);
    this.name = "NormalizationError";
  }
}

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly reason: SyncErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SyncError";
  }
}

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly reason: StoreErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function statusOf(error: unknown): number | undefined {
  const status = pick(error, "response", "status") ?? pick(error, "status") ?? pick(error, "code");
  return typeof status === "number" ? status : undefined;
}

// Google answers throttling with 403 too, tagged in errors[0]
function isRateLimited(error: unknown): boolean {
  const detail = pick(error, "errors", 0) ?? pick(error, "response", "data", "error", "errors", 0);
  const reason = pick(detail, "reason");
  return (
    pick(detail, "domain") === "usageLimits" ||
    (typeof reason === "string" && /rateLimitExceeded|quotaExceeded|dailyLimitExceeded/i.test(reason))
  );
}

// Calendar failures: 401/403 mean bad credentials, anything else an outage
export function toSyncError(action: string, error: unknown): SyncError {
  if (error instanceof SyncError) return error;
  const status = statusOf(error);
  const denied = status === 401 || (status === 403 && !isRateLimited(error));
  const reason = denied ? "auth_failure" : "provider_unavailable";
  return new SyncError(`Calendar ${action} failed: ${errorMessage(error)}`, reason, { cause: error });
}
