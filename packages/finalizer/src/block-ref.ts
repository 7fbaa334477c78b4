/**
 * Zero values, identity and formatting for block references.
 */

import type { BlockId, L1BlockRef, L2BlockRef } from "@l2-finality/types";

const ZERO_HASH = "0x0000000000000000000000000000000000000000000000000000000000000000";

export const ZERO_BLOCK_ID: BlockId = Object.freeze({ hash: ZERO_HASH, number: 0 });

/** The finality signal before any has been received. */
export const ZERO_L1_BLOCK_REF: L1BlockRef = Object.freeze({
  hash: ZERO_HASH,
  number: 0,
  parentHash: ZERO_HASH,
  timestamp: 0,
});

export const ZERO_L2_BLOCK_REF: L2BlockRef = Object.freeze({
  hash: ZERO_HASH,
  number: 0,
  parentHash: ZERO_HASH,
  timestamp: 0,
  l1Origin: ZERO_BLOCK_ID,
  sequenceNumber: 0,
});

export function toBlockId(ref: BlockId): BlockId {
  return { hash: ref.hash, number: ref.number };
}

export function blockIdEquals(a: BlockId, b: BlockId): boolean {
  return a.number === b.number && a.hash === b.hash;
}

export function l1BlockRefEquals(a: L1BlockRef, b: L1BlockRef): boolean {
  return (
    blockIdEquals(a, b) &&
    a.parentHash === b.parentHash &&
    a.timestamp === b.timestamp
  );
}

export function l2BlockRefEquals(a: L2BlockRef, b: L2BlockRef): boolean {
  return (
    l1BlockRefEquals(a, b) &&
    blockIdEquals(a.l1Origin, b.l1Origin) &&
    a.sequenceNumber === b.sequenceNumber
  );
}

export function isZeroBlockId(id: BlockId): boolean {
  return blockIdEquals(id, ZERO_BLOCK_ID);
}

export function isZeroL1BlockRef(ref: L1BlockRef): boolean {
  return l1BlockRefEquals(ref, ZERO_L1_BLOCK_REF);
}

/**
 * Render a block identity as `<hash>:<number>` for logs and error messages.
 */
export function formatBlockId(id: BlockId): string {
  return `${id.hash}:${id.number}`;
}
