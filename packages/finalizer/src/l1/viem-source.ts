/**
 * Viem L1 Block Source — canonical L1 lookups over JSON-RPC.
 *
 * Uses viem for all chain interactions. Read-only: one `eth_getBlockByNumber`
 * per lookup, no caching, since the point is to see what the node currently
 * considers canonical.
 */

import { createPublicClient, http, type Hash } from "viem";
import { isL1BlockRef, type L1BlockRef } from "@l2-finality/types";
import type { L1BlockSource } from "./source.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ViemL1BlockSourceConfig {
  /** L1 execution-layer RPC endpoint */
  readonly rpcUrl: string;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number | undefined;
}

/**
 * The slice of a viem public client this source needs.
 */
export interface BlockReader {
  getBlock(args: { blockNumber: bigint }): Promise<{
    readonly hash: Hash | null;
    readonly number: bigint | null;
    readonly parentHash: Hash;
    readonly timestamp: bigint;
  }>;
}

// =============================================================================
// Source
// =============================================================================

export class ViemL1BlockSource implements L1BlockSource {
  private readonly client: BlockReader;

  constructor(client: BlockReader) {
    this.client = client;
  }

  async l1BlockRefByNumber(blockNumber: number, signal?: AbortSignal): Promise<L1BlockRef> {
    throwIfAborted(signal);

    const block = await abortable(
      this.client.getBlock({ blockNumber: BigInt(blockNumber) }),
      signal,
    );

    if (block.hash === null || block.number === null) {
      throw new Error(`ViemL1BlockSource: block ${blockNumber} is still pending`);
    }
    if (block.number !== BigInt(blockNumber)) {
      throw new Error(
        `ViemL1BlockSource: asked for block ${blockNumber}, RPC returned ${block.number}`,
      );
    }

    const ref = {
      hash: block.hash,
      number: Number(block.number),
      parentHash: block.parentHash,
      timestamp: Number(block.timestamp),
    };
    if (!isL1BlockRef(ref)) {
      throw new Error(`ViemL1BlockSource: block ${blockNumber} has fields outside the safe integer range`);
    }
    return ref;
  }
}

/**
 * Build a source backed by viem's HTTP transport.
 */
export function createViemL1BlockSource(config: ViemL1BlockSourceConfig): ViemL1BlockSource {
  const client = createPublicClient({
    transport: http(config.rpcUrl, {
      timeout: config.timeoutMs ?? 30_000,
    }),
  });
  return new ViemL1BlockSource(client);
}

// =============================================================================
// Cancellation
// =============================================================================

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new Error("L1 block lookup aborted");
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    throw abortReason(signal);
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (signal === undefined) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
