/**
 * Canonical-chain lookups used to sanity-check finality.
 */

import type { L1BlockRef } from "@l2-finality/types";

/**
 * Answers "what is the canonical L1 block at height N right now?".
 *
 * Implementations reject on any failure; the finalizer treats every
 * rejection as transient. A resolved block whose hash disagrees with an
 * earlier assumption signals a reorg.
 */
export interface L1BlockSource {
  l1BlockRefByNumber(blockNumber: number, signal?: AbortSignal): Promise<L1BlockRef>;
}
