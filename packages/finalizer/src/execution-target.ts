/**
 * The execution engine side of finality: holder of the finalized L2 head.
 */

import type { L2BlockRef } from "@l2-finality/types";
import { ZERO_L2_BLOCK_REF } from "./block-ref.js";

/**
 * The execution engine as seen by the finalizer.
 */
export interface ExecutionTarget {
  /** Currently finalized L2 block (pure read) */
  currentFinalized(): L2BlockRef;

  /** Commit a new finalized L2 head */
  setFinalized(ref: L2BlockRef): void;
}

/**
 * In-process execution target for tests and local wiring. Keeps every
 * committed head, oldest first, so it is not meant for a long-running node;
 * production code implements `ExecutionTarget` over its engine API.
 */
export class InMemoryExecutionTarget implements ExecutionTarget {
  private finalized: L2BlockRef;
  private readonly committed: L2BlockRef[] = [];

  constructor(initial: L2BlockRef = ZERO_L2_BLOCK_REF) {
    this.finalized = initial;
  }

  currentFinalized(): L2BlockRef {
    return this.finalized;
  }

  setFinalized(ref: L2BlockRef): void {
    this.finalized = ref;
    this.committed.push(ref);
  }

  get history(): readonly L2BlockRef[] {
    return [...this.committed];
  }
}
