/**
 * Same-domain FIFO with a registered read port.
 *
 * Indices run over [0, 2C) so that equal low bits with different wrap bits
 * mean full and fully equal indices mean empty; no slot is sacrificed.
 * A read request commits the head value to `readData` on that tick; the
 * consumer sees it from the next tick on.
 */
import type { BufferSnapshot } from './types';

export interface BufferRequest<T> {
  /** Value to push this tick, if any. */
  write?: T;
  read: boolean;
}

export interface BufferResult {
  /** False when a write was offered but the buffer was full. */
  accepted: boolean;
  /** True when a read request found data and advanced the read index. */
  popped: boolean;
}

export function checkCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 2 || (capacity & (capacity - 1)) !== 0) {
    throw new RangeError(`Buffer capacity must be a power of two >= 2, got ${capacity}`);
  }
}

/** Occupancy of a buffer from its two wrap-extended indices. */
export function pointerLevel(writeIndex: number, readIndex: number, capacity: number): number {
  const span = capacity * 2;
  return (writeIndex - readIndex + span) % span;
}

export class CircularBuffer<T> {
  readonly capacity: number;
  private readonly storage: T[];
  private readonly fill: T;
  private w = 0;
  private r = 0;
  private _readData: T;

  constructor(capacity: number, fill: T) {
    checkCapacity(capacity);
    this.capacity = capacity;
    this.fill = fill;
    this.storage = new Array<T>(capacity).fill(fill);
    this._readData = fill;
  }

  get writeIndex(): number {
    return this.w;
  }

  get readIndex(): number {
    return this.r;
  }

  /** Registered read output. */
  get readData(): T {
    return this._readData;
  }

  isEmpty(): boolean {
    return this.w === this.r;
  }

  isFull(): boolean {
    return this.level() === this.capacity;
  }

  level(): number {
    return pointerLevel(this.w, this.r, this.capacity);
  }

  /**
   * One clock tick. Full/empty are judged on the state before the tick, so a
   * simultaneous read does not make room for a write on a full buffer.
   */
  tick(request: BufferRequest<T>): BufferResult {
    const full = this.isFull();
    const empty = this.isEmpty();
    const span = this.capacity * 2;
    let accepted = true;
    let popped = false;

    if (request.read && !empty) {
      this._readData = this.storage[this.r % this.capacity];
      this.r = (this.r + 1) % span;
      popped = true;
    }
    if (request.write !== undefined) {
      if (full) {
        accepted = false;
      } else {
        this.storage[this.w % this.capacity] = request.write;
        this.w = (this.w + 1) % span;
      }
    }
    return { accepted, popped };
  }

  /** Push without a read; dropped (returns false) when full. */
  write(value: T): boolean {
    return this.tick({ write: value, read: false }).accepted;
  }

  /** Request a read; the value appears on `readData` after this tick. */
  read(): boolean {
    return this.tick({ read: true }).popped;
  }

  reset(): void {
    this.w = 0;
    this.r = 0;
    this.storage.fill(this.fill);
    this._readData = this.fill;
  }

  getSnapshot(): BufferSnapshot<T> {
    return {
      capacity: this.capacity,
      writeIndex: this.w,
      readIndex: this.r,
      level: this.level(),
      empty: this.isEmpty(),
      full: this.isFull(),
      readData: this._readData,
    };
  }
}
