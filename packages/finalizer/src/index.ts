/**
 * @l2-finality/finalizer — L1-driven finality for a rollup node.
 *
 * Buffers which L2 blocks were derived from which L1 blocks, and promotes the
 * L2 finalized head when L1 finality catches up with them.
 *
 * Design rules:
 * - Never finalize an L2 block whose L1 provenance is not final and canonical
 * - Bounded memory: provenance is a fixed-size sliding window
 * - Temporary and reset failures are returned as tagged outcomes, never thrown
 * - No background work; the owning node drives every pass
 */

// Finalizer
export { Finalizer } from "./finalizer.js";
export type { FinalizerOptions, PassOptions } from "./finalizer.js";

// Provenance buffer
export { ProvenanceBuffer } from "./provenance-buffer.js";
export type { ProvenanceLink, RecordResult } from "./provenance-buffer.js";

// Lookback sizing
export {
  DEFAULT_FINALITY_LOOKBACK,
  FINALITY_DELAY,
  calcFinalityLookback,
} from "./lookback.js";
export type { AltDAWindows, LookbackConfig } from "./lookback.js";

// Errors and outcomes
export {
  FinalityError,
  TemporaryError,
  ResetError,
  isTemporaryError,
  isResetError,
  ok,
  temporaryFailure,
  resetRequired,
} from "./errors.js";
export type {
  FinalityErrorKind,
  FinalizationOutcome,
  OkOutcome,
  TemporaryOutcome,
  ResetOutcome,
} from "./errors.js";

// Collaborators
export { InMemoryExecutionTarget } from "./execution-target.js";
export type { ExecutionTarget } from "./execution-target.js";
export { ViemL1BlockSource, createViemL1BlockSource } from "./l1/index.js";
export type { L1BlockSource, ViemL1BlockSourceConfig, BlockReader } from "./l1/index.js";

// Block reference helpers
export {
  ZERO_BLOCK_ID,
  ZERO_L1_BLOCK_REF,
  ZERO_L2_BLOCK_REF,
  toBlockId,
  blockIdEquals,
  l1BlockRefEquals,
  l2BlockRefEquals,
  isZeroBlockId,
  isZeroL1BlockRef,
  formatBlockId,
} from "./block-ref.js";

// Configuration and logging
export { FinalizerEnvSchema, LOG_LEVELS, loadFinalizerConfig } from "./config.js";
export type { FinalizerConfig, FinalizerEnv, LoadedConfig, LogLevel } from "./config.js";
export { createLogger, loggerOptionsFromConfig } from "./logger.js";
export type { FinalizerLogger, LoggerOptions } from "./logger.js";

// Re-export chain types from @l2-finality/types for convenience
export type { BlockHash, BlockId, L1BlockRef, L2BlockRef } from "@l2-finality/types";
