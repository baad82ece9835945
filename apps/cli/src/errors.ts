import { isVizError, type VizError, type VizErrorCode } from '@vizbot/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode = VizErrorCode | 'INVALID_ARGS' | 'NOT_CONFIGURED' | 'NOT_FOUND' | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, code: CliErrorCode, details?: unknown): CliError {
  return new CliError('policy', code, message, details);
}

function kindOf(code: VizErrorCode): CliErrorKind {
  switch (code) {
    case 'UNSAFE_STATEMENT':
    case 'SCHEMA_MISMATCH':
      return 'policy';
    case 'INVALID_CONFIG':
      return 'usage';
    default:
      return 'runtime';
  }
}

/** Pipeline errors keep their code; the user-facing text becomes the message. */
export function fromVizError(err: VizError): CliError {
  const details: Record<string, unknown> = { error: err.message };
  if (err.message === err.userMessage) {
    return new CliError(kindOf(err.code), err.code, err.message, details);
  }
  return new CliError(kindOf(err.code), err.code, `${err.userMessage} (${err.message})`, details);
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (isVizError(error)) return fromVizError(error);
  const message = error instanceof Error ? error.message : String(error);
  return runtimeError(message, 'INTERNAL_ERROR', error instanceof Error ? { stack: error.stack } : { raw: message });
}

export function toExitCode(error: unknown): number {
  const { kind } = toCliError(error);
  if (kind === 'usage') return EXIT_CODE_USAGE;
  if (kind === 'policy') return EXIT_CODE_POLICY;
  return EXIT_CODE_RUNTIME;
}
