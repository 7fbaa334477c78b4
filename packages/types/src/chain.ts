/**
 * Chain Types
 *
 * Block references for the settlement chain (L1) and the rollup chain (L2).
 *
 * Rules:
 * - Block numbers are non-negative safe integers
 * - Hashes are 0x-prefixed hex strings, compared verbatim
 * - All references are read-only observation data
 */

/**
 * Block hash (0x-prefixed hex).
 */
export type BlockHash = string;

/**
 * Minimal identity of a block: its hash and height.
 */
export interface BlockId {
  readonly hash: BlockHash;
  readonly number: number;
}

/**
 * Reference to a block on the settlement chain.
 */
export interface L1BlockRef {
  readonly hash: BlockHash;
  readonly number: number;
  readonly parentHash: BlockHash;

  /** Block timestamp, unix seconds */
  readonly timestamp: number;
}

/**
 * Reference to a block on the rollup chain.
 */
export interface L2BlockRef {
  readonly hash: BlockHash;
  readonly number: number;
  readonly parentHash: BlockHash;

  /** Block timestamp, unix seconds */
  readonly timestamp: number;

  /** The L1 block this L2 block's epoch is anchored to */
  readonly l1Origin: BlockId;

  /** Position of this block within its L1 origin's epoch */
  readonly sequenceNumber: number;
}
