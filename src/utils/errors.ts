import type { ErrorKind } from '../types/index.js';

export class ApplyError extends Error {
  readonly kind: ErrorKind;
  readonly recoverable: boolean;

  constructor(kind: ErrorKind, message: string, recoverable = true) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.recoverable = recoverable;
  }
}

export class AuthenticationFailure extends ApplyError {
  constructor(message: string) {
    super('AuthenticationFailure', message);
  }
}

export class FieldDetectionFailure extends ApplyError {
  constructor(message: string) {
    super('FieldDetectionFailure', message);
  }
}

export class MappingUnresolved extends ApplyError {
  readonly labels: string[];

  constructor(labels: string[]) {
    super('MappingUnresolved', `No confident mapping for required field(s): ${labels.join(', ')}`);
    this.labels = labels;
  }
}

export class UploadFailure extends ApplyError {
  constructor(message: string) {
    super('UploadFailure', message);
  }
}

export class SubmissionFailure extends ApplyError {
  constructor(message: string) {
    super('SubmissionFailure', message);
  }
}

export class AIProviderError extends ApplyError {
  constructor(message: string) {
    super('AIProviderError', message);
  }
}

export class BrowserTimeout extends ApplyError {
  constructor(message: string) {
    super('BrowserTimeout', message);
  }
}

export class AttemptCancelled extends ApplyError {
  constructor(message = 'Attempt cancelled') {
    super('AttemptCancelled', message, false);
  }
}

/** Thrown while loading configuration, before any attempt starts. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toApplyError(error: unknown): ApplyError {
  if (error instanceof ApplyError) return error;
  return new ApplyError('UnexpectedError', errorMessage(error), false);
}
