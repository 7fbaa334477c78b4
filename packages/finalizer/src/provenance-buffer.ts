/**
 * Provenance Buffer — Bounded record of which L2 block was last derived from
 * which L1 block.
 *
 * Design:
 * - One link per distinct L1 block, L1 numbers strictly increasing
 * - Fixed capacity; the oldest link is evicted to make room for a new one
 * - Ring storage (array + logical start offset), no shifting on eviction
 */

import type { BlockId, L2BlockRef } from "@l2-finality/types";
import { l2BlockRefEquals, toBlockId } from "./block-ref.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A single L1↔L2 provenance link.
 */
export interface ProvenanceLink {
  /** The last L2 block fully derived while processing `l1Block` */
  readonly l2Block: L2BlockRef;

  /**
   * The L1 block derivation was at when `l2Block` was produced.
   * Once it is finalized, the L2 chain up to `l2Block` is reproducible
   * from finalized L1 data alone.
   */
  readonly l1Block: BlockId;
}

/**
 * What `record` did to the buffer.
 */
export type RecordResult = "appended" | "updated" | "unchanged";

// =============================================================================
// Provenance Buffer
// =============================================================================

export class ProvenanceBuffer {
  readonly capacity: number;
  private readonly slots: (ProvenanceLink | undefined)[];
  private start = 0;
  private size = 0;

  constructor(capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `ProvenanceBuffer: capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
    this.slots = new Array<ProvenanceLink | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.size;
  }

  /**
   * Record that `l2Block` was the last block fully derived from `derivedFrom`.
   *
   * A newer L1 block appends a link (evicting the oldest when full).
   * Otherwise the newest link is overwritten in place, since several L2
   * blocks can be derived from the same L1 block.
   */
  record(l2Block: L2BlockRef, derivedFrom: BlockId): RecordResult {
    const last = this.latest();

    if (last === undefined || last.l1Block.number < derivedFrom.number) {
      if (this.size === this.capacity) {
        this.slots[this.start] = undefined;
        this.start = (this.start + 1) % this.capacity;
        this.size--;
      }
      this.slots[this.physical(this.size)] = {
        l2Block,
        l1Block: toBlockId(derivedFrom),
      };
      this.size++;
      return "appended";
    }

    if (l2BlockRefEquals(last.l2Block, l2Block)) {
      return "unchanged";
    }
    this.slots[this.physical(this.size - 1)] = { l2Block, l1Block: last.l1Block };
    return "updated";
  }

  /** Newest link, if any. */
  latest(): ProvenanceLink | undefined {
    return this.size === 0 ? undefined : this.at(this.size - 1);
  }

  /** Link at logical position `index` (0 = oldest). */
  at(index: number): ProvenanceLink | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      return undefined;
    }
    return this.slots[this.physical(index)];
  }

  clear(): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.size = 0;
  }

  /** Snapshot, oldest first. */
  toArray(): readonly ProvenanceLink[] {
    return [...this];
  }

  *[Symbol.iterator](): IterableIterator<ProvenanceLink> {
    for (let i = 0; i < this.size; i++) {
      const link = this.slots[this.physical(i)];
      if (link !== undefined) {
        yield link;
      }
    }
  }

  private physical(index: number): number {
    return (this.start + index) % this.capacity;
  }
}
