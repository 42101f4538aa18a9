/**
 * FIFO whose write side and read side are clocked by different domains.
 *
 * Layout matches CircularBuffer: C slots, indices over [0, 2C). The write
 * index lives in the write domain, the read index in the read domain, and
 * each reaches the other side only through a GraySync. Both sides therefore
 * judge full/empty against a slightly stale copy of the opposite index,
 * which errs on the safe side: the writer may see "full" a few ticks after
 * space was freed, the reader may see "empty" a few ticks after data landed.
 *
 *   write domain:  tickWrite()  owns w, samples r through readIndexSync
 *   read domain:   tickRead()   owns r, samples w through writeIndexSync
 */
import { DEFAULT_SYNC_STAGES } from './constants';
import { checkCapacity, pointerLevel } from './circular-buffer';
import { GraySync } from './sync';
import type { MetastabilityResolver } from './types';

export interface ReadSideRequest {
  read: boolean;
  /** Start discarding everything the read side can currently see. */
  flush?: boolean;
}

export interface CrossDomainBufferOptions {
  stages?: number;
  resolver?: MetastabilityResolver | null;
}

export class CrossDomainBuffer<T> {
  readonly capacity: number;
  /** Bits per index: log2(C) + 1. */
  readonly indexWidth: number;
  private readonly storage: T[];
  private readonly fill: T;

  // Write domain
  private w = 0;
  private readonly readIndexSync: GraySync;

  // Read domain
  private r = 0;
  private readonly writeIndexSync: GraySync;
  private _readData: T;
  private drainTarget: number | null = null;

  constructor(capacity: number, fill: T, options: CrossDomainBufferOptions = {}) {
    checkCapacity(capacity);
    this.capacity = capacity;
    this.indexWidth = Math.log2(capacity) + 1;
    this.fill = fill;
    this.storage = new Array<T>(capacity).fill(fill);
    this._readData = fill;

    const stages = options.stages ?? DEFAULT_SYNC_STAGES;
    const resolver = options.resolver ?? null;
    this.readIndexSync = new GraySync(this.indexWidth, stages, 0, resolver);
    this.writeIndexSync = new GraySync(this.indexWidth, stages, 0, resolver);
  }

  // ========================================================================
  // Write side
  // ========================================================================

  get writeIndex(): number {
    return this.w;
  }

  /** Read index as currently known to the write domain. */
  get syncedReadIndex(): number {
    return this.readIndexSync.output;
  }

  writeLevel(): number {
    return pointerLevel(this.w, this.readIndexSync.output, this.capacity);
  }

  isFullAtWrite(): boolean {
    return this.writeLevel() === this.capacity;
  }

  isEmptyAtWrite(): boolean {
    return this.w === this.readIndexSync.output;
  }

  /**
   * Write-domain tick. Returns false when `value` was offered and dropped
   * because the buffer looked full.
   */
  tickWrite(value?: T): boolean {
    const full = this.isFullAtWrite();
    this.readIndexSync.tick(this.r);
    if (value === undefined) return true;
    if (full) return false;
    this.storage[this.w % this.capacity] = value;
    this.w = (this.w + 1) % (this.capacity * 2);
    return true;
  }

  // ========================================================================
  // Read side
  // ========================================================================

  get readIndex(): number {
    return this.r;
  }

  /** Write index as currently known to the read domain. */
  get syncedWriteIndex(): number {
    return this.writeIndexSync.output;
  }

  /** Registered read output. */
  get readData(): T {
    return this._readData;
  }

  /** True while a flush is still walking the read index forward. */
  get draining(): boolean {
    return this.drainTarget !== null;
  }

  readLevel(): number {
    return pointerLevel(this.writeIndexSync.output, this.r, this.capacity);
  }

  isEmptyAtRead(): boolean {
    return this.r === this.writeIndexSync.output;
  }

  isFullAtRead(): boolean {
    return this.readLevel() === this.capacity;
  }

  /**
   * Read-domain tick. Returns true when a read popped a value into
   * `readData`.
   *
   * A flush walks r one slot per tick up to the write index seen when the
   * flush began, so the index still moves by single Gray steps. Reads are
   * ignored until it finishes.
   */
  tickRead(request: ReadSideRequest): boolean {
    const empty = this.isEmptyAtRead();
    const syncedW = this.writeIndexSync.output;
    this.writeIndexSync.tick(this.w);

    if (request.flush && this.drainTarget === null) {
      this.drainTarget = syncedW;
    }
    if (this.drainTarget !== null) {
      if (this.r === this.drainTarget) {
        this.drainTarget = null;
      } else {
        this.r = (this.r + 1) % (this.capacity * 2);
        if (this.r === this.drainTarget) this.drainTarget = null;
      }
      return false;
    }

    if (!request.read || empty) return false;
    this._readData = this.storage[this.r % this.capacity];
    this.r = (this.r + 1) % (this.capacity * 2);
    return true;
  }

  // ========================================================================
  // Reset
  // ========================================================================

  /** Power-on reset of both sides. Only valid while both domains are held. */
  reset(): void {
    this.w = 0;
    this.r = 0;
    this.drainTarget = null;
    this.storage.fill(this.fill);
    this._readData = this.fill;
    this.readIndexSync.reset();
    this.writeIndexSync.reset();
  }
}
