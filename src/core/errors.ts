/**
 * Error taxonomy for an upgrade run.
 *
 * Syntax and runtime failures are not exceptions: they travel as
 * ValidationResults and are fed back to the collaborator. Everything here
 * ends either one file's task or the whole run.
 */

export type UpgradeErrorCode = "config" | "collaborator" | "workspace_io" | "aborted";

export class UpgradeError extends Error {
  readonly code: UpgradeErrorCode;

  constructor(code: UpgradeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpgradeError";
    this.code = code;
  }
}

/** Malformed or missing configuration. Fatal before any file is processed. */
export class ConfigError extends UpgradeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

export type CollaboratorErrorKind =
  | "timeout"
  | "malformed"
  | "auth"
  | "rate_limited"
  | "unavailable"
  | "unreachable"
  | "provider";

const RETRYABLE_KINDS: ReadonlySet<CollaboratorErrorKind> = new Set([
  "timeout",
  "malformed",
  "rate_limited",
  "unavailable",
  "unreachable",
]);

/** Kinds after which no other file can be served either. */
const FATAL_KINDS: ReadonlySet<CollaboratorErrorKind> = new Set(["auth", "unreachable"]);

export class CollaboratorError extends UpgradeError {
  readonly kind: CollaboratorErrorKind;

  constructor(kind: CollaboratorErrorKind, message: string, options?: { cause?: unknown }) {
    super("collaborator", message, options);
    this.name = "CollaboratorError";
    this.kind = kind;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }

  get fatal(): boolean {
    return FATAL_KINDS.has(this.kind);
  }
}

/** Local read/write failure on one file. Fatal for that file only. */
export class WorkspaceIOError extends UpgradeError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super("workspace_io", message, options);
    this.name = "WorkspaceIOError";
    this.filePath = filePath;
  }
}

/** A user-level abort interrupted the run. */
export class RunAbortedError extends UpgradeError {
  constructor(message = "Run aborted", options?: { cause?: unknown }) {
    super("aborted", message, options);
    this.name = "RunAbortedError";
  }
}

const NETWORK_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "ECONNRESET", "ETIMEDOUT", "EAI_AGAIN"]);

/**
 * Map whatever a provider SDK threw onto a CollaboratorError.
 * Status codes win over message sniffing.
 */
export function classifyCollaboratorError(error: unknown): CollaboratorError {
  if (error instanceof CollaboratorError) return error;

  const err = error instanceof Error ? error : new Error(String(error));
  const msg = err.message.toLowerCase();
  const statusCode = extractStatusCode(err);
  const code = extractErrorCode(err);

  if (statusCode === 401 || statusCode === 403 || msg.includes("unauthorized") || msg.includes("authentication") || msg.includes("invalid api key")) {
    return new CollaboratorError("auth", `Collaborator authentication failed: ${err.message}`, { cause: err });
  }

  if (statusCode === 429 || msg.includes("rate limit") || msg.includes("too many requests")) {
    return new CollaboratorError("rate_limited", `Collaborator rate limited: ${err.message}`, { cause: err });
  }

  if ((statusCode !== null && statusCode >= 500) || msg.includes("overloaded") || msg.includes("service unavailable")) {
    return new CollaboratorError("unavailable", `Collaborator unavailable: ${err.message}`, { cause: err });
  }

  if ((code !== null && NETWORK_CODES.has(code)) || msg.includes("connection error") || msg.includes("fetch failed")) {
    return new CollaboratorError("unreachable", `Collaborator unreachable: ${err.message}`, { cause: err });
  }

  if (msg.includes("timeout") || msg.includes("timed out")) {
    return new CollaboratorError("timeout", `Collaborator timed out: ${err.message}`, { cause: err });
  }

  return new CollaboratorError("provider", `Collaborator request failed: ${err.message}`, { cause: err });
}

function extractStatusCode(err: Error): number | null {
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return null;
}

function extractErrorCode(err: Error): string | null {
  if ("code" in err && typeof err.code === "string") return err.code;
  const cause = err.cause;
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") return cause.code;
  return null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
