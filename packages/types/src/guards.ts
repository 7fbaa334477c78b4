/**
 * Runtime Type Guards
 *
 * Narrowing functions for block references.
 * ViemL1BlockSource checks every mapped RPC answer with `isL1BlockRef`.
 */

import type { BlockId, L1BlockRef, L2BlockRef } from "./chain.js";

function isBlockNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isHash(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isBlockId(value: unknown): value is BlockId {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isHash(v.hash) && isBlockNumber(v.number);
}

export function isL1BlockRef(value: unknown): value is L1BlockRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHash(v.hash) &&
    isBlockNumber(v.number) &&
    isHash(v.parentHash) &&
    isBlockNumber(v.timestamp)
  );
}

export function isL2BlockRef(value: unknown): value is L2BlockRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isL1BlockRef(v) &&
    isBlockId(v.l1Origin) &&
    isBlockNumber(v.sequenceNumber)
  );
}
