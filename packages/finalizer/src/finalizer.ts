/**
 * Finalizer — Maps L1 finality onto the L2 chain.
 *
 * Tracks which L2 block was last derived from each recent L1 block, and when
 * L1 declares a block final, promotes the newest L2 block whose provenance is
 * at or below it. Nothing is committed before the finality signal and the
 * buffered provenance have both been checked against the canonical L1 chain.
 *
 * Concurrency:
 * - Finalization passes (`finalize`, `onDerivationBoundary`) are serialized
 *   by one mutex, held across the L1 lookups
 * - `recordProvenance` and `reset` never wait; a pass that was overtaken by
 *   a `reset` while fetching commits nothing
 */

import { Mutex } from "async-mutex";
import type { BlockId, L1BlockRef, L2BlockRef } from "@l2-finality/types";
import {
  ZERO_L1_BLOCK_REF,
  formatBlockId,
  isZeroL1BlockRef,
  l1BlockRefEquals,
} from "./block-ref.js";
import type { FinalizerConfig } from "./config.js";
import {
  ok,
  resetRequired,
  temporaryFailure,
  type FinalizationOutcome,
  type ResetOutcome,
  type TemporaryOutcome,
} from "./errors.js";
import type { ExecutionTarget } from "./execution-target.js";
import type { L1BlockSource } from "./l1/source.js";
import type { FinalizerLogger } from "./logger.js";
import { FINALITY_DELAY, calcFinalityLookback } from "./lookback.js";
import { ProvenanceBuffer, type ProvenanceLink } from "./provenance-buffer.js";

// =============================================================================
// Types
// =============================================================================

export interface FinalizerOptions {
  readonly logger: FinalizerLogger;
  readonly config?: FinalizerConfig;
  readonly l1Source: L1BlockSource;
  readonly engine: ExecutionTarget;
}

export interface PassOptions {
  /** Cancels the L1 lookups of this pass; a cancelled pass commits nothing */
  readonly signal?: AbortSignal;
}

type CanonicalCheck = { readonly status: "canonical" } | TemporaryOutcome | ResetOutcome;

// =============================================================================
// Finalizer
// =============================================================================

export class Finalizer {
  /** Maximum number of provenance links retained */
  readonly lookback: number;

  private readonly log: FinalizerLogger;
  private readonly finalityDelay: number;
  private readonly l1Source: L1BlockSource;
  private readonly engine: ExecutionTarget;
  private readonly mutex = new Mutex();
  private readonly buffer: ProvenanceBuffer;

  /** Latest accepted finality signal. May be ahead of derivation while syncing. */
  private finalizedL1: L1BlockRef = ZERO_L1_BLOCK_REF;

  /** L1 block number of the last throttled pass, 0 if none since the last signal or reset */
  private lastTriedAt = 0;

  /** Bumped by `reset`; a pass only commits if it is unchanged */
  private generation = 0;

  constructor(options: FinalizerOptions) {
    const config = options.config ?? {};
    const finalityDelay = config.finalityDelay ?? FINALITY_DELAY;
    if (!Number.isSafeInteger(finalityDelay) || finalityDelay < 0) {
      throw new RangeError(
        `Finalizer: finalityDelay must be a non-negative integer, got ${finalityDelay}`,
      );
    }

    this.log = options.logger;
    this.l1Source = options.l1Source;
    this.engine = options.engine;
    this.finalityDelay = finalityDelay;
    this.lookback = calcFinalityLookback(config);
    this.buffer = new ProvenanceBuffer(this.lookback);
  }

  /**
   * The L1 chain (inclusive) that included or produced every finalized L2 block.
   * Zero-valued until the first finality signal.
   */
  currentFinalizedL1(): L1BlockRef {
    return this.finalizedL1;
  }

  get triedFinalizeAt(): number {
    return this.lastTriedAt;
  }

  /** Snapshot of the provenance links, oldest first. */
  provenance(): readonly ProvenanceLink[] {
    return this.buffer.toArray();
  }

  /**
   * Apply an L1 finality signal, then try to finalize L2 against it.
   *
   * Signals older than the current one are logged and ignored. Failures of the
   * finalization pass are logged; the signal itself stays recorded.
   */
  finalize(l1Origin: L1BlockRef, options: PassOptions = {}): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const prev = this.finalizedL1;
      if (l1Origin.number < prev.number) {
        this.log.error(
          {
            prevFinalizedL1: formatBlockId(prev),
            signaledFinalizedL1: formatBlockId(l1Origin),
          },
          "Ignoring old L1 finalized block signal, is the L1 provider corrupted?",
        );
        return;
      }

      if (!l1BlockRefEquals(prev, l1Origin)) {
        // new signal: give the next boundary trigger a shot without waiting out the delay
        this.lastTriedAt = 0;
        this.finalizedL1 = l1Origin;
      }

      const outcome = await this.tryFinalize(options.signal);
      if (outcome.status !== "ok") {
        this.log.warn(
          { err: outcome.error, kind: outcome.status, l1Finalized: formatBlockId(l1Origin) },
          "Received L1 finalization signal, but was unable to determine and apply L2 finality",
        );
      }
    });
  }

  /**
   * Called once derivation has exhausted `derivedFrom`: no more L2 blocks will
   * be produced from it, so every L2 block it yielded can finalize together.
   *
   * Throttled to one pass per `finalityDelay` L1 blocks.
   */
  onDerivationBoundary(
    derivedFrom: L1BlockRef,
    options: PassOptions = {},
  ): Promise<FinalizationOutcome> {
    return this.mutex.runExclusive(async () => {
      if (isZeroL1BlockRef(this.finalizedL1)) {
        return ok();
      }
      if (
        this.lastTriedAt !== 0 &&
        derivedFrom.number <= this.lastTriedAt + this.finalityDelay
      ) {
        return ok();
      }

      this.log.info(
        {
          l1Finalized: formatBlockId(this.finalizedL1),
          derivedFrom: formatBlockId(derivedFrom),
          previous: this.lastTriedAt,
        },
        "Processing L1 finality information",
      );
      this.lastTriedAt = derivedFrom.number;
      return this.tryFinalize(options.signal);
    });
  }

  /**
   * Remember that `l2Safe` is the last L2 block fully derived from `derivedFrom`,
   * so it can finalize once `derivedFrom` (or a later L1 block) does.
   */
  recordProvenance(l2Safe: L2BlockRef, derivedFrom: BlockId): void {
    const result = this.buffer.record(l2Safe, derivedFrom);
    const last = this.buffer.latest();
    if (result === "unchanged" || last === undefined) {
      return;
    }
    this.log.debug(
      { lastL1: formatBlockId(last.l1Block), lastL2: formatBlockId(last.l2Block) },
      result === "appended" ? "Extended finality data" : "Updated finality data",
    );
  }

  /**
   * Forget recent provenance so reorged-out L2 blocks can never finalize.
   * The finality signal is kept: it is final after all.
   */
  reset(): void {
    this.buffer.clear();
    this.lastTriedAt = 0;
    this.generation++;
  }

  // ===========================================================================
  // Finalization pass
  // ===========================================================================

  private async tryFinalize(signal: AbortSignal | undefined): Promise<FinalizationOutcome> {
    const generation = this.generation;
    const finalizedL1 = this.finalizedL1;

    let candidate = this.engine.currentFinalized();
    let found: BlockId | undefined;
    for (const link of this.buffer) {
      if (link.l2Block.number > candidate.number && link.l1Block.number <= finalizedL1.number) {
        candidate = link.l2Block;
        found = link.l1Block;
        // keep going, a later link may finalize further
      }
    }
    if (found === undefined) {
      return ok();
    }
    const derivedFrom = found;

    // The signal is trusted, but it must still be canonical to build on.
    const signalCheck = await this.checkCanonical(finalizedL1, signal, (actual) =>
      `need to reset, we assumed ${formatBlockId(finalizedL1)} is finalized, ` +
      `but canonical chain is ${formatBlockId(actual)}`,
    );
    if (signalCheck.status !== "canonical") {
      return signalCheck;
    }

    // And we must actually be on the chain that is finalizing.
    const provenanceCheck = await this.checkCanonical(derivedFrom, signal, (actual) =>
      `need to reset, we are on ${formatBlockId(derivedFrom)}, ` +
      `not on the finalizing L1 chain ${formatBlockId(actual)} (towards ${formatBlockId(finalizedL1)})`,
    );
    if (provenanceCheck.status !== "canonical") {
      return provenanceCheck;
    }

    if (this.generation !== generation) {
      this.log.debug(
        { candidate: formatBlockId(candidate) },
        "Discarding finalization pass, provenance was reset while verifying",
      );
      return ok();
    }
    if (candidate.number <= this.engine.currentFinalized().number) {
      return ok();
    }

    this.engine.setFinalized(candidate);
    this.log.info(
      {
        l2Finalized: formatBlockId(candidate),
        l1DerivedFrom: formatBlockId(derivedFrom),
        l1Finalized: formatBlockId(finalizedL1),
      },
      "Finalized L2 chain",
    );
    return ok();
  }

  private async checkCanonical(
    expected: BlockId,
    signal: AbortSignal | undefined,
    mismatch: (actual: L1BlockRef) => string,
  ): Promise<CanonicalCheck> {
    const fetchFailed = `failed to check if on finalizing L1 chain, could not fetch block ${expected.number}`;

    if (isAborted(signal)) {
      return temporaryFailure(fetchFailed, signal?.reason);
    }

    let actual: L1BlockRef;
    try {
      actual = await this.l1Source.l1BlockRefByNumber(expected.number, signal);
    } catch (err: unknown) {
      return temporaryFailure(fetchFailed, err);
    }

    if (isAborted(signal)) {
      return temporaryFailure(fetchFailed, signal?.reason);
    }
    if (actual.hash !== expected.hash) {
      return resetRequired(mismatch(actual));
    }
    return { status: "canonical" };
  }
}

function isAborted(signal: AbortSignal | undefined): boolean {
  return signal?.aborted === true;
}
