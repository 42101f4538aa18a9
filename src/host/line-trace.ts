/**
 * Ring buffer of serial line transitions, stamped with the tick they were
 * first seen on.
 */
import type { SerialBit } from '../core/serial';
import type { Bit } from '../core/types';

const DEFAULT_CAPACITY = 1 << 16;

export interface LineTransition {
  tick: number;
  level: Bit;
}

export class LineTrace {
  readonly capacity: number;
  private readonly ticks: number[];
  private readonly levels: Bit[];
  private start = 0;
  private count = 0;
  private _level: Bit;
  private readonly initialLevel: Bit;
  /** Transitions lost to wrap-around. */
  dropped = 0;

  constructor(capacity: number = DEFAULT_CAPACITY, initialLevel: Bit = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LineTrace capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.ticks = new Array<number>(capacity).fill(0);
    this.levels = new Array<Bit>(capacity).fill(initialLevel);
    this.initialLevel = initialLevel;
    this._level = initialLevel;
  }

  get level(): Bit {
    return this._level;
  }

  get length(): number {
    return this.count;
  }

  /** Record the line level seen on `tick`. Only changes are stored. */
  record(tick: number, level: Bit): void {
    if (level === this._level) return;
    this._level = level;
    const idx = (this.start + this.count) % this.capacity;
    this.ticks[idx] = tick;
    this.levels[idx] = level;
    if (this.count >= this.capacity) {
      this.start = (this.start + 1) % this.capacity;
      this.dropped++;
    } else {
      this.count++;
    }
  }

  transitions(): LineTransition[] {
    const out: LineTransition[] = [];
    for (let i = 0; i < this.count; i++) {
      const idx = (this.start + i) % this.capacity;
      out.push({ tick: this.ticks[idx], level: this.levels[idx] });
    }
    return out;
  }

  /**
   * Convert the retained history into run-length segments from its first
   * transition (or tick 0 when nothing was dropped) up to `endTick`.
   */
  toSegments(endTick: number): SerialBit[] {
    const transitions = this.transitions();
    const segments: SerialBit[] = [];
    let level: Bit = this.dropped > 0 || transitions.length === 0 ? this._level : this.initialLevel;
    let from = 0;
    if (this.dropped > 0 && transitions.length > 0) {
      level = transitions[0].level;
      from = transitions[0].tick;
      transitions.shift();
    }
    for (const t of transitions) {
      if (t.tick > from) segments.push({ level, ticks: t.tick - from });
      level = t.level;
      from = t.tick;
    }
    if (endTick > from) segments.push({ level, ticks: endTick - from });
    return segments;
  }

  reset(): void {
    this.start = 0;
    this.count = 0;
    this.dropped = 0;
    this._level = this.initialLevel;
  }
}
