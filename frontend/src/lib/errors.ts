/**
 * Error kinds raised by the ratio link core.
 *
 * Every class carries a string `kind` so callers can switch on it instead of
 * relying on instanceof across module or worker boundaries.
 */

export type RatioLinkErrorKind =
  | "QuerySyntaxError"
  | "QueryFieldError"
  | "GroupEmptyError"
  | "UnknownFeatureError"
  | "SnapshotValidationError"
  | "MetadataFieldConflictError"
  | "RankFieldTypeError"
  | "DatasetFetchError"
  | "WorkerError";

export abstract class RatioLinkError extends Error {
  abstract readonly kind: RatioLinkErrorKind;
}

// ─── Query errors ──────────────────────────────────────────

/** Malformed query. `token` is the offending substring, `position` its 0-based offset. */
export class QuerySyntaxError extends RatioLinkError {
  readonly kind = "QuerySyntaxError";

  constructor(
    message: string,
    readonly token: string,
    readonly position: number,
  ) {
    super(`${message} at position ${position}${token ? ` near "${token}"` : ""}`);
    this.name = "QuerySyntaxError";
  }
}

export class QueryFieldError extends RatioLinkError {
  readonly kind = "QueryFieldError";

  constructor(
    readonly field: string,
    readonly position: number | null = null,
  ) {
    super(`Unknown metadata field "${field}"`);
    this.name = "QueryFieldError";
  }
}

// ─── Selection errors ──────────────────────────────────────

export type SlotName = "numerator" | "denominator";

export class GroupEmptyError extends RatioLinkError {
  readonly kind = "GroupEmptyError";

  constructor(readonly slot: SlotName, detail?: string) {
    super(detail ?? `The ${slot} group contains no features`);
    this.name = "GroupEmptyError";
  }
}

export class UnknownFeatureError extends RatioLinkError {
  readonly kind = "UnknownFeatureError";

  constructor(readonly featureId: string) {
    super(`Feature "${featureId}" is not in the feature metadata`);
    this.name = "UnknownFeatureError";
  }
}

// ─── Dataset errors ────────────────────────────────────────

export class SnapshotValidationError extends RatioLinkError {
  readonly kind = "SnapshotValidationError";

  constructor(readonly problems: readonly string[]) {
    super(
      problems.length === 1
        ? `Invalid dataset snapshot: ${problems[0]}`
        : `Invalid dataset snapshot (${problems.length} problems): ${problems.join("; ")}`,
    );
    this.name = "SnapshotValidationError";
  }
}

export class MetadataFieldConflictError extends RatioLinkError {
  readonly kind = "MetadataFieldConflictError";

  constructor(readonly fields: readonly string[]) {
    super(`Metadata fields differ only by case: ${fields.join(", ")}`);
    this.name = "MetadataFieldConflictError";
  }
}

export class RankFieldTypeError extends RatioLinkError {
  readonly kind = "RankFieldTypeError";

  constructor(readonly field: string) {
    super(`Rank field "${field}" is not numeric`);
    this.name = "RankFieldTypeError";
  }
}

export class DatasetFetchError extends RatioLinkError {
  readonly kind = "DatasetFetchError";

  constructor(readonly status: number, statusText: string) {
    super(`Dataset request failed: ${status} ${statusText}`);
    this.name = "DatasetFetchError";
  }
}

export class WorkerError extends RatioLinkError {
  readonly kind = "WorkerError";

  constructor(message: string) {
    super(message);
    this.name = "WorkerError";
  }
}

// ─── Packet detail ─────────────────────────────────────────

export interface ErrorDetail {
  kind: RatioLinkErrorKind | "UnexpectedError";
  message: string;
  token?: string;
  position?: number;
}

export function isRatioLinkError(err: unknown): err is RatioLinkError {
  return err instanceof RatioLinkError;
}

/** Flatten any thrown value into the serializable shape carried by packets. */
export function toErrorDetail(err: unknown): ErrorDetail {
  if (err instanceof QuerySyntaxError) {
    return { kind: err.kind, message: err.message, token: err.token, position: err.position };
  }
  if (err instanceof QueryFieldError) {
    return err.position === null
      ? { kind: err.kind, message: err.message, token: err.field }
      : { kind: err.kind, message: err.message, token: err.field, position: err.position };
  }
  if (isRatioLinkError(err)) {
    return { kind: err.kind, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { kind: "UnexpectedError", message };
}
