/**
 * Finality lookback sizing.
 *
 * The provenance buffer keeps one L1↔L2 link per L1 block. When L1 finalizes,
 * it finalizes at most this many blocks behind its head, so older links can
 * never be the ones a new finality signal lands on.
 *
 * A buffer that is too small never finalizes anything incorrectly. It only
 * lets finality lag, because the matching link was already evicted.
 */

/**
 * Default number of provenance links to retain.
 *
 * The beacon chain has 32 slots per epoch and finalizes at most 4 epochs
 * behind the head. One extra slot leaves room to append before pruning.
 */
export const DEFAULT_FINALITY_LOOKBACK = 4 * 32 + 1;

/**
 * Number of L1 blocks to traverse before a pipeline-boundary trigger tries to
 * finalize again. Each attempt fetches L1 blocks by number, which is uncached.
 */
export const FINALITY_DELAY = 64;

/**
 * Alternative data-availability windows, in L1 blocks.
 */
export interface AltDAWindows {
  readonly challengeWindow: number;
  readonly resolveWindow: number;
}

export interface LookbackConfig {
  /** Lookback used when alt-DA is off or its windows are shorter (default: 129) */
  readonly defaultLookback?: number;

  /** Present only when alt-DA mode is active */
  readonly altDA?: AltDAWindows;
}

/**
 * Compute how many provenance links the finalizer must retain.
 *
 * Under alt-DA a commitment can be challenged on the last block of the
 * challenge window and then take the whole resolve window to settle.
 */
export function calcFinalityLookback(config: LookbackConfig = {}): number {
  const fallback = config.defaultLookback ?? DEFAULT_FINALITY_LOOKBACK;
  if (config.altDA === undefined) {
    return fallback;
  }
  const { challengeWindow, resolveWindow } = config.altDA;
  return Math.max(fallback, challengeWindow + resolveWindow + 1);
}
