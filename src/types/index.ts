/**
 * Core type definitions for the prospect pipeline
 *
 * This module exports the shared result, error and status types used across
 * every module. Domain shapes that belong to a single module (scores, drafts,
 * inbound events) live with that module.
 */

// ============================================================================
// Error Taxonomy
// ============================================================================

/**
 * Error kinds surfaced by modules and handlers
 *
 * - InputError: a required field is missing or malformed; nothing was written
 * - ProviderError: a collaborator (record store, relay, LLM, mail) failed or timed out
 * - ParseError: LLM output did not match the expected structured shape
 * - PartialUpdateError: a downstream write failed after an upstream step succeeded
 * - ComposeError: outreach personalization failed (wraps a provider or parse cause)
 */
export type ErrorKind =
  | 'InputError'
  | 'ProviderError'
  | 'ParseError'
  | 'PartialUpdateError'
  | 'ComposeError';

export interface ModuleError {
  kind: ErrorKind;
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Error thrown by adapters that expose a throwing API (the record store).
 * The orchestrator converts it back into a ModuleError at its boundary.
 */
export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly details: unknown;

  constructor(kind: ErrorKind, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.code = code;
    this.details = details;
  }

  toModuleError(): ModuleError {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

/**
 * Convert anything caught into a ModuleError, keeping PipelineError kinds intact
 */
export function toModuleError(error: unknown, kind: ErrorKind, code: string): ModuleError {
  if (error instanceof PipelineError) {
    return error.toModuleError();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind, code, message };
}

// ============================================================================
// Module Results
// ============================================================================

export interface ResultMetadata {
  module: string;
  timestamp: string;
  duration: number;
}

/**
 * Module result wrapper
 *
 * Discriminated on `success` so callers narrow to `data` or `error`
 * without assertions.
 */
export type ModuleResult<T> =
  | { success: true; data: T; metadata: ResultMetadata }
  | { success: false; error: ModuleError; metadata: ResultMetadata };

function buildMetadata(module: string, startTime: number): ResultMetadata {
  return {
    module,
    timestamp: new Date().toISOString(),
    duration: Date.now() - startTime,
  };
}

export function succeed<T>(module: string, data: T, startTime: number): ModuleResult<T> {
  return { success: true, data, metadata: buildMetadata(module, startTime) };
}

export function fail<T>(module: string, error: ModuleError, startTime: number): ModuleResult<T> {
  return { success: false, error, metadata: buildMetadata(module, startTime) };
}

// ============================================================================
// Record Lifecycle Enums
// ============================================================================

export const FIT_LEVELS = ['Strong', 'Moderate', 'Weak', 'N/A'] as const;
export type FitLevel = (typeof FIT_LEVELS)[number];

/** Firm "Research Status" select values */
export type ResearchStatus = 'New' | 'Researching' | 'Qualified';

/** Prospect "Status" select values */
export type ContactStatus = 'New' | 'Enriching' | 'Qualified';

export type ReplyClassification = 'Positive' | 'Negative' | 'Neutral';
