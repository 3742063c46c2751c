/**
 * Error taxonomy for the orchestration core.
 *
 * Every error carries a stable code and a small context object so the HTTP
 * layer and the CLI can map failures without string matching.
 */

import type { SessionState } from '../session/types.js';

export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  MISSING_DEPENDENCY_RESULT = 'MISSING_DEPENDENCY_RESULT',
  UNSATISFIABLE_DEPENDENCY = 'UNSATISFIABLE_DEPENDENCY',
  WORKER_LAUNCH_FAILURE = 'WORKER_LAUNCH_FAILURE',
  VERIFICATION_FAILURE = 'VERIFICATION_FAILURE',
  CORRUPT_RECORD = 'CORRUPT_RECORD',
  CONFIG_INVALID = 'CONFIG_INVALID',
  ALIAS_CONFLICT = 'ALIAS_CONFLICT',
}

export interface ErrorContext {
  sessionId?: string;
  [key: string]: unknown;
}

export class SessionError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options: { context?: ErrorContext; cause?: unknown; isRetryable?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'SessionError';
    this.code = code;
    this.context = options.context ?? {};
    this.isRetryable = options.isRetryable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class NotFoundError extends SessionError {
  constructor(sessionId: string, message: string = `Session ${sessionId} not found`) {
    super(ErrorCode.NOT_FOUND, message, { context: { sessionId } });
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends SessionError {
  constructor(sessionId: string, from: SessionState, to: SessionState | null, reason?: string) {
    const target = to ?? from;
    const message = reason
      ? `Invalid mutation of session ${sessionId} (${from}): ${reason}`
      : `Invalid transition for session ${sessionId}: ${from} -> ${target}`;
    super(ErrorCode.INVALID_TRANSITION, message, { context: { sessionId, from, to } });
    this.name = 'InvalidTransitionError';
  }
}

export class AliasConflictError extends SessionError {
  constructor(alias: string, ownerId: string) {
    super(ErrorCode.ALIAS_CONFLICT, `Alias ${alias} is already used by session ${ownerId}`, {
      context: { sessionId: ownerId, alias },
    });
    this.name = 'AliasConflictError';
  }
}

export class MissingDependencyResultError extends SessionError {
  constructor(sessionId: string, predecessorId: string) {
    super(
      ErrorCode.MISSING_DEPENDENCY_RESULT,
      `Cannot compose contract for ${sessionId}: predecessor ${predecessorId} has no result`,
      { context: { sessionId, predecessorId } }
    );
    this.name = 'MissingDependencyResultError';
  }
}

export class UnsatisfiableDependencyError extends SessionError {
  constructor(sessionId: string, reason: string) {
    super(ErrorCode.UNSATISFIABLE_DEPENDENCY, `Dependencies of ${sessionId} cannot be satisfied: ${reason}`, {
      context: { sessionId, reason },
    });
    this.name = 'UnsatisfiableDependencyError';
  }
}

export class WorkerLaunchError extends SessionError {
  constructor(sessionId: string, message: string, cause?: unknown) {
    super(ErrorCode.WORKER_LAUNCH_FAILURE, `Failed to launch worker for ${sessionId}: ${message}`, {
      context: { sessionId },
      cause,
      isRetryable: true,
    });
    this.name = 'WorkerLaunchError';
  }
}

export class VerificationError extends SessionError {
  constructor(sessionId: string, message: string, cause?: unknown) {
    super(ErrorCode.VERIFICATION_FAILURE, `Verification of ${sessionId} could not run: ${message}`, {
      context: { sessionId },
      cause,
      isRetryable: true,
    });
    this.name = 'VerificationError';
  }
}

export class CorruptRecordError extends SessionError {
  constructor(sessionId: string, detail: string) {
    super(ErrorCode.CORRUPT_RECORD, `Session record ${sessionId} is unreadable: ${detail}`, {
      context: { sessionId },
    });
    this.name = 'CorruptRecordError';
  }
}

export class ConfigError extends SessionError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.CONFIG_INVALID, message, { cause });
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
