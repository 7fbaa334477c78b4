/**
 * @l2-finality/types — Shared chain reference types.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards validate shape only, never chain semantics
 */

// Chain types
export type {
  BlockHash,
  BlockId,
  L1BlockRef,
  L2BlockRef,
} from "./chain.js";

// Runtime type guards
export {
  isBlockId,
  isL1BlockRef,
  isL2BlockRef,
} from "./guards.js";
