import { ERROR_CODES, normaliseErrorHint, normaliseErrorMessage } from "../types.js";

/** Codes raised when a caller hands the node layer a malformed value. */
type NodeValidationCode = typeof ERROR_CODES.NODE_INVALID_INDEX | typeof ERROR_CODES.NODE_INVALID_PARAMS;

/** Codes raised by the portable snapshot codec. */
type NodeSnapshotCode =
  | typeof ERROR_CODES.SNAPSHOT_INVALID
  | typeof ERROR_CODES.SNAPSHOT_UNSUPPORTED;

/**
 * Error thrown when a raw node index is neither the detached sentinel nor a
 * non-negative integer, or when a parameter list does not fit the catalog
 * entry of a fixed operation.
 */
export class NodeValidationError extends Error {
  /** Stable error code identifying the rejected value. */
  public readonly code: NodeValidationCode;

  /** Optional hint describing how to recover from the error. */
  public readonly hint?: string;

  /** Structured details attached for diagnostics. */
  public readonly details: Record<string, unknown>;

  constructor(code: NodeValidationCode, message: string, details: Record<string, unknown> = {}, hint?: string) {
    super(normaliseErrorMessage(message));
    this.name = "NodeValidationError";
    this.code = code;
    this.hint = normaliseErrorHint(hint);
    this.details = details;
  }
}

/**
 * Error thrown when a value handed to an operation node does not match any
 * recognised operation shape. Subclasses {@link TypeError} so callers can
 * branch on the built-in class as well as on {@link code}.
 */
export class OperationTypeError extends TypeError {
  public readonly code: typeof ERROR_CODES.NODE_INVALID_OPERATION;
  public readonly hint?: string;
  /** Validation issues reported while inspecting the value. */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], hint?: string) {
    super(normaliseErrorMessage(message));
    this.name = "OperationTypeError";
    this.code = ERROR_CODES.NODE_INVALID_OPERATION;
    this.hint = normaliseErrorHint(hint);
    this.issues = issues;
  }
}

/** Error raised while encoding or decoding a portable node snapshot. */
export class NodeSnapshotError extends Error {
  public readonly code: NodeSnapshotCode;
  public readonly hint?: string;
  public readonly path: string;

  constructor(code: NodeSnapshotCode, message: string, path = "/", hint?: string) {
    super(normaliseErrorMessage(message));
    this.name = "NodeSnapshotError";
    this.code = code;
    this.path = path;
    this.hint = normaliseErrorHint(hint);
  }
}
