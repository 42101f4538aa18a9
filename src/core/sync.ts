/**
 * Clock-domain-crossing synchronizers.
 *
 * Every value that leaves one clock domain is read by the other only through
 * one of these chains. Each stage holds a whole sample; the destination sees
 * the source value after `stages` of its own ticks.
 *
 * A synchronizer's `tick` belongs to the destination domain and samples a
 * registered value of the source domain. PulseSync is the exception: it has a
 * half in each domain (`tickSource` / `tickDestination`).
 */
import { DEFAULT_SYNC_STAGES, PULSE_SYNC_STAGES } from './constants';
import { bitAt, toGray, fromGray, widthMask } from './gray';
import type { Bit, MetastabilityResolver } from './types';

function checkStages(stages: number): void {
  if (!Number.isInteger(stages) || stages < 2) {
    throw new RangeError(`Synchronizer needs at least 2 stages, got ${stages}`);
  }
}

// ============================================================================
// Single bit
// ============================================================================

export class BitSync {
  readonly stages: number;
  private readonly resetValue: Bit;
  private readonly resolver: MetastabilityResolver | null;
  private chain: Bit[];
  // Input level at the previous sample
  private lastInput: Bit;

  constructor(
    stages: number = DEFAULT_SYNC_STAGES,
    resetValue: Bit = 0,
    resolver: MetastabilityResolver | null = null,
  ) {
    checkStages(stages);
    this.stages = stages;
    this.resetValue = resetValue;
    this.resolver = resolver;
    this.chain = new Array<Bit>(stages).fill(resetValue);
    this.lastInput = resetValue;
  }

  get output(): Bit {
    return this.chain[this.stages - 1];
  }

  /** Value held by stage `index` (0 = first capture). */
  stage(index: number): Bit {
    return this.chain[index];
  }

  /**
   * A bit that differs from the previous sample can be caught
   * mid-transition; the resolver picks the previous level or the new one.
   * `unstable` narrows that to bits whose change may still be in flight.
   */
  tick(input: Bit, unstable: boolean = true): void {
    const captured = this.resolver && unstable && input !== this.lastInput
      ? this.resolver(this.lastInput, input)
      : input;
    this.lastInput = input;
    for (let i = this.stages - 1; i > 0; i--) {
      this.chain[i] = this.chain[i - 1];
    }
    this.chain[0] = captured;
  }

  reset(): void {
    this.chain.fill(this.resetValue);
    this.lastInput = this.resetValue;
  }

  toArray(): Bit[] {
    return [...this.chain];
  }
}

// ============================================================================
// Independent bits
// ============================================================================

/**
 * One BitSync per bit. Only valid for bits that carry unrelated flags:
 * a counter sampled this way can tear.
 */
export class MultiBitSync {
  readonly width: number;
  private readonly bits: BitSync[];

  constructor(
    width: number,
    stages: number = DEFAULT_SYNC_STAGES,
    resetValue: number = 0,
    resolver: MetastabilityResolver | null = null,
  ) {
    widthMask(width);
    this.width = width;
    this.bits = [];
    for (let i = 0; i < width; i++) {
      this.bits.push(new BitSync(stages, bitAt(resetValue, i), resolver));
    }
  }

  get output(): number {
    let value = 0;
    for (let i = 0; i < this.width; i++) {
      value |= this.bits[i].output << i;
    }
    return value >>> 0;
  }

  /**
   * `unstableMask` marks the bits whose latest change may be in flight.
   * Without it, every bit that changed since the previous sample counts.
   * A masked bit that did not change is captured as is.
   */
  tick(input: number, unstableMask?: number): void {
    for (let i = 0; i < this.width; i++) {
      const bit = bitAt(input, i);
      if (unstableMask === undefined) this.bits[i].tick(bit);
      else this.bits[i].tick(bit, bitAt(unstableMask, i) === 1);
    }
  }

  reset(): void {
    for (const bit of this.bits) bit.reset();
  }
}

// ============================================================================
// Gray-coded counters
// ============================================================================

/**
 * Multi-bit value carried as Gray code. When the source moves by one, only one
 * bit changes, so a sample taken mid-transition decodes to the old or the new
 * value and nothing else.
 *
 * Meant for counters. When the source advanced several steps since the last
 * sample, only the bit flipped by the final step can still be settling; the
 * earlier ones have had at least a source tick to resolve. If that bit ends
 * where it was at the previous sample, nothing is in flight.
 */
export class GraySync {
  readonly width: number;
  private readonly mask: number;
  private readonly chain: MultiBitSync;
  private lastGray: number;
  private readonly resetGray: number;

  constructor(
    width: number,
    stages: number = DEFAULT_SYNC_STAGES,
    resetValue: number = 0,
    resolver: MetastabilityResolver | null = null,
  ) {
    this.width = width;
    this.mask = widthMask(width);
    this.lastGray = toGray((resetValue & this.mask) >>> 0);
    this.resetGray = this.lastGray;
    this.chain = new MultiBitSync(width, stages, this.lastGray, resolver);
  }

  /** Decoded destination-side value. */
  get output(): number {
    return fromGray(this.chain.output, this.width);
  }

  /** Raw Gray word at the end of the chain. */
  get gray(): number {
    return this.chain.output;
  }

  /** Sample the source domain's registered binary value. */
  tick(sourceValue: number): void {
    const value = (sourceValue & this.mask) >>> 0;
    const gray = toGray(value);
    const unstable = gray === this.lastGray
      ? 0
      : gray ^ toGray(((value - 1) & this.mask) >>> 0);
    this.lastGray = gray;
    this.chain.tick(gray, unstable);
  }

  reset(): void {
    this.chain.reset();
    this.lastGray = this.resetGray;
  }
}

// ============================================================================
// Toggle pulse crossing
// ============================================================================

/**
 * Carries single-tick events across domains.
 *
 * The source flips a toggle flag per event. The destination runs the flag
 * through a 3-stage chain and emits one pulse whenever the two most recent
 * synchronized samples differ.
 *
 * With `useAck`, the destination flips an acknowledgment flag on each pulse
 * and the source only reports `ready` once that flag has come back through
 * its own 2-stage chain. At most one event is then in flight; an event
 * offered while not ready is refused.
 */
export class PulseSync {
  readonly useAck: boolean;

  // Source domain
  private toggle: Bit = 0;
  private readonly ackSync: BitSync;
  private _refused = 0;

  // Destination domain
  private readonly chain: BitSync;
  private ackToggle: Bit = 0;
  private _delivered = 0;

  constructor(useAck: boolean = false, resolver: MetastabilityResolver | null = null) {
    this.useAck = useAck;
    this.chain = new BitSync(PULSE_SYNC_STAGES, 0, resolver);
    this.ackSync = new BitSync(DEFAULT_SYNC_STAGES, 0, resolver);
  }

  // ---- Source side ----

  /** True when the source may launch another event. */
  get ready(): boolean {
    return !this.useAck || this.toggle === this.ackSync.output;
  }

  /** Events refused because the previous one was still in flight. */
  get refused(): number {
    return this._refused;
  }

  /**
   * Source-domain tick. Returns whether `pulse` was launched.
   */
  tickSource(pulse: boolean): boolean {
    const ready = this.ready;
    this.ackSync.tick(this.ackToggle);
    if (!pulse) return false;
    if (!ready) {
      this._refused++;
      return false;
    }
    this.toggle = this.toggle === 0 ? 1 : 0;
    return true;
  }

  resetSource(): void {
    this.toggle = 0;
    this.ackSync.reset();
    this._refused = 0;
  }

  // ---- Destination side ----

  /** One-tick pulse in the destination domain. */
  get pulse(): boolean {
    return this.chain.stage(PULSE_SYNC_STAGES - 2) !== this.chain.stage(PULSE_SYNC_STAGES - 1);
  }

  /** Pulses emitted so far. */
  get delivered(): number {
    return this._delivered;
  }

  tickDestination(): void {
    this.chain.tick(this.toggle);
    if (this.pulse) {
      this._delivered++;
      if (this.useAck) this.ackToggle = this.ackToggle === 0 ? 1 : 0;
    }
  }

  resetDestination(): void {
    this.chain.reset();
    this.ackToggle = 0;
    this._delivered = 0;
  }

  reset(): void {
    this.resetSource();
    this.resetDestination();
  }
}
