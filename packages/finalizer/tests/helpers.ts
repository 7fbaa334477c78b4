/**
 * Shared fixtures: block factories, an in-process L1 source and a spy logger.
 */

import { vi } from "vitest";
import type { BlockId, L1BlockRef, L2BlockRef } from "@l2-finality/types";
import type { L1BlockSource } from "../src/l1/source.js";
import type { FinalizerLogger } from "../src/logger.js";

// =============================================================================
// Block factories
// =============================================================================

/** L1 block `n` on fork `fork` (hash `0x<fork>1<n>`). */
export function l1(n: number, fork = "a"): L1BlockRef {
  return {
    hash: `0x${fork}1${n}`,
    number: n,
    parentHash: `0x${fork}1${n - 1}`,
    timestamp: 1_000 + n * 12,
  };
}

/** L2 block `n` (hash `0xb2<n>`) anchored to `origin`. */
export function l2(n: number, origin: BlockId = l1(0), sequenceNumber = 0): L2BlockRef {
  return {
    hash: `0xb2${n}`,
    number: n,
    parentHash: `0xb2${n - 1}`,
    timestamp: 2_000 + n * 2,
    l1Origin: { hash: origin.hash, number: origin.number },
    sequenceNumber,
  };
}

// =============================================================================
// L1 source
// =============================================================================

/**
 * Canonical chain is fork "a" unless overridden per height.
 * Every lookup is recorded in `calls`.
 */
export class FakeL1Source implements L1BlockSource {
  readonly calls: number[] = [];
  readonly overrides = new Map<number, L1BlockRef>();
  failure: Error | undefined;
  gate: Promise<void> | undefined;

  async l1BlockRefByNumber(blockNumber: number): Promise<L1BlockRef> {
    this.calls.push(blockNumber);
    if (this.gate !== undefined) {
      await this.gate;
    }
    if (this.failure !== undefined) {
      throw this.failure;
    }
    return this.overrides.get(blockNumber) ?? l1(blockNumber);
  }
}

// =============================================================================
// Logger
// =============================================================================

export function makeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies FinalizerLogger;
}
