/**
 * Finality error taxonomy.
 *
 * Two failure kinds leave a finalization pass without committing anything:
 * - temporary: the L1 source could not answer; try again on a later trigger
 * - reset: the finality assumption disagrees with the canonical L1 chain;
 *   the owning node must discard its derivation state
 *
 * Passes report these as a tagged outcome instead of throwing, so callers
 * have to branch on the reset case explicitly.
 */

// =============================================================================
// Error Types
// =============================================================================

export type FinalityErrorKind = "temporary" | "reset";

export abstract class FinalityError extends Error {
  abstract readonly kind: FinalityErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/**
 * The L1 source could not be reached, or the request was cancelled.
 */
export class TemporaryError extends FinalityError {
  readonly kind = "temporary" as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TemporaryError";
  }
}

/**
 * The assumed-finalized L1 chain is no longer canonical.
 */
export class ResetError extends FinalityError {
  readonly kind = "reset" as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ResetError";
  }
}

export function isTemporaryError(err: unknown): err is TemporaryError {
  return err instanceof TemporaryError;
}

export function isResetError(err: unknown): err is ResetError {
  return err instanceof ResetError;
}

// =============================================================================
// Tagged Outcome
// =============================================================================

export interface OkOutcome {
  readonly status: "ok";
}

export interface TemporaryOutcome {
  readonly status: "temporary";
  readonly error: TemporaryError;
}

export interface ResetOutcome {
  readonly status: "reset";
  readonly error: ResetError;
}

export type FinalizationOutcome = OkOutcome | TemporaryOutcome | ResetOutcome;

const OK: OkOutcome = Object.freeze({ status: "ok" });

export function ok(): OkOutcome {
  return OK;
}

export function temporaryFailure(message: string, cause?: unknown): TemporaryOutcome {
  return { status: "temporary", error: new TemporaryError(message, cause) };
}

export function resetRequired(message: string, cause?: unknown): ResetOutcome {
  return { status: "reset", error: new ResetError(message, cause) };
}
