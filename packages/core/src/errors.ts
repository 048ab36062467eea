/**
 * Pipeline error taxonomy. Per-company conditions travel as values, not exceptions.
 */

import type { PipelineErrorKind } from '@founder-finder/schemas';

export interface PipelineError {
  kind: PipelineErrorKind;
  message: string;
  cause?: unknown;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: PipelineError };

export function pipelineError(
  kind: PipelineErrorKind,
  message: string,
  cause?: unknown,
): PipelineError {
  return cause === undefined ? { kind, message } : { kind, message, cause };
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: PipelineError): Result<T> {
  return { ok: false, error };
}

/** Message of a thrown value, whatever was thrown. */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  try {
    return JSON.stringify(e) ?? String(e);
  } catch {
    return String(e);
  }
}
