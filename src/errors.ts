/** Error taxonomy shared by the bridge, patch engine and runner. */

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "TARGET_UNREACHABLE"
  | "PERMISSION_DENIED"
  | "TIMEOUT"
  | "REMOTE_COMMAND_FAILED"
  | "VALIDATION_FAILURE"
  | "CACHE_INVALIDATION_FAILURE";

export class PhasectlError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Cyclic phase graph, malformed rule, missing target config. Fatal before any remote mutation. */
export class ConfigurationError extends PhasectlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIGURATION_ERROR", message, details);
  }
}

export class TargetUnreachableError extends PhasectlError {
  constructor(target: string, reason?: string) {
    super("TARGET_UNREACHABLE", `Target unreachable: ${target}${reason ? ` (${reason})` : ""}`, { target });
  }
}

export class PermissionDeniedError extends PhasectlError {
  constructor(remotePath: string, stderr: string) {
    super("PERMISSION_DENIED", `Permission denied: ${remotePath}: ${stderr.trim()}`, { remotePath });
  }
}

export class TimeoutError extends PhasectlError {
  constructor(operation: string, timeoutMs: number) {
    super("TIMEOUT", `Timed out after ${timeoutMs}ms: ${operation}`, { operation, timeoutMs });
  }
}

export class RemoteCommandFailedError extends PhasectlError {
  readonly exitCode: number;

  constructor(command: string, exitCode: number, stderr: string) {
    super("REMOTE_COMMAND_FAILED", `Remote command failed (exit ${exitCode}): ${command}${stderr.trim() ? `: ${stderr.trim()}` : ""}`, {
      command,
      exitCode,
    });
    this.exitCode = exitCode;
  }
}

export class ValidationFailure extends PhasectlError {
  constructor(file: string, diagnostics: string) {
    super("VALIDATION_FAILURE", `Validation failed for ${file}: ${diagnostics}`, { file });
  }
}

export class CacheInvalidationFailure extends PhasectlError {
  constructor(scope: string, reason: string) {
    super("CACHE_INVALIDATION_FAILURE", `Cache invalidation failed for ${scope}: ${reason}`, { scope });
  }
}

/** Timeouts and unreachable targets are eligible for bounded retry inside a phase body. */
export function isTransient(err: unknown): boolean {
  return err instanceof TimeoutError || err instanceof TargetUnreachableError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
