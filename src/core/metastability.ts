/**
 * Abstract metastability model for synchronizer sampling.
 *
 * A bit that changed since the previous sample may have been caught
 * mid-transition. Real flops resolve such a sample to either the old or the
 * new level; which one is effectively random. The model draws that outcome
 * from a seeded xorshift32 stream so runs are replayable.
 *
 *   - probability 0: every changing bit resolves to the new level
 *   - probability 1: every changing bit keeps its old level for that tick
 *
 * A kept old level is replaced on the next sample, since by then the input
 * has been stable for a whole tick. Latency grows by at most one tick.
 */
import type { Bit, MetastabilityResolver } from './types';

export interface MetastabilityState {
  /** Chance that a changing bit resolves to its previous level. */
  probability: number;
  prngState: number;
  /** Changing-bit samples seen. */
  transitions: number;
  /** Samples that resolved to the previous level. */
  held: number;
}

export function createMetastabilityState(probability: number, seed?: number): MetastabilityState {
  if (!(probability >= 0 && probability <= 1)) {
    throw new RangeError(`Metastability probability must be in [0, 1]: ${probability}`);
  }
  return {
    probability,
    prngState: (seed ?? (Math.random() * 0x7FFFFFFF) | 0) || 1,
    transitions: 0,
    held: 0,
  };
}

/**
 * xorshift32 PRNG.
 * Returns a value in [0, 1).
 */
function xorshift32(state: MetastabilityState): number {
  let x = state.prngState;
  x ^= x << 13;
  x ^= x >> 17;
  x ^= x << 5;
  state.prngState = x;
  return (x >>> 0) / 0x100000000;
}

/** Build a resolver bound to `state`, for use by every synchronizer stage 0. */
export function metastabilityResolver(state: MetastabilityState): MetastabilityResolver {
  return (previous: Bit, incoming: Bit): Bit => {
    state.transitions++;
    if (xorshift32(state) < state.probability) {
      state.held++;
      return previous;
    }
    return incoming;
  };
}
