/**
 * Hides a buffer's one-tick read latency behind a holding register.
 *
 *   IDLE -----(source non-empty, enabled)-----> FETCHING
 *   FETCHING -----------(next tick)-----------> READY     captures readData
 *   READY ----(consume, source non-empty)-----> FETCHING
 *   READY ----(consume, source empty)---------> IDLE
 *
 * `readEnable()` is asserted on exactly the ticks that enter FETCHING, so
 * every byte leaves the buffer once and is delivered once.
 */
import { FetchState } from './types';
import type { PrefetchSnapshot } from './types';

export interface PrefetchInput<T> {
  enabled: boolean;
  sourceEmpty: boolean;
  /** The source's registered read output. */
  sourceData: T;
  /** The consumer takes the held value this tick. */
  consume: boolean;
}

export class PrefetchRegister<T> {
  private state: FetchState = FetchState.IDLE;
  private holding: T;
  private readonly empty: T;
  private _reads = 0;
  private _delivered = 0;

  constructor(empty: T) {
    this.empty = empty;
    this.holding = empty;
  }

  get fetchState(): FetchState {
    return this.state;
  }

  /** Held value is valid and may be consumed. */
  get valid(): boolean {
    return this.state === FetchState.READY;
  }

  get value(): T {
    return this.holding;
  }

  /** Buffer reads issued since reset. */
  get reads(): number {
    return this._reads;
  }

  /** Values consumed since reset. */
  get delivered(): number {
    return this._delivered;
  }

  /**
   * Source read-enable for this tick, derived from the current state and
   * this tick's inputs. Feed it to the buffer on the same tick.
   */
  readEnable(input: PrefetchInput<T>): boolean {
    if (!input.enabled || input.sourceEmpty) return false;
    if (this.state === FetchState.IDLE) return true;
    return this.state === FetchState.READY && input.consume;
  }

  /**
   * Advance one tick. Returns the consumed value when `consume` hit a valid
   * holding register, otherwise undefined.
   */
  tick(input: PrefetchInput<T>): T | undefined {
    if (!input.enabled) {
      this.clear();
      return undefined;
    }

    const fetch = this.readEnable(input);
    let consumed: T | undefined;

    switch (this.state) {
      case FetchState.IDLE:
        break;

      case FetchState.FETCHING:
        this.holding = input.sourceData;
        this.state = FetchState.READY;
        break;

      case FetchState.READY:
        if (input.consume) {
          consumed = this.holding;
          this._delivered++;
          this.state = FetchState.IDLE;
        }
        break;
    }

    if (fetch) {
      this._reads++;
      this.state = FetchState.FETCHING;
    }
    return consumed;
  }

  /** Drop the held value and any fetch in flight. */
  clear(): void {
    this.state = FetchState.IDLE;
    this.holding = this.empty;
  }

  reset(): void {
    this.clear();
    this._reads = 0;
    this._delivered = 0;
  }

  getSnapshot(): PrefetchSnapshot<T> {
    return {
      state: this.state,
      valid: this.valid,
      value: this.holding,
      reads: this._reads,
    };
  }
}
