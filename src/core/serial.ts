import { DATA_BITS, BITS_PER_FRAME } from './constants';
import { bitAt } from './gray';
import type { Bit } from './types';

/** Run-length segment of a serial line, measured in wire ticks. */
export type SerialBit = { level: Bit; ticks: number };

export interface BuildOptions {
  /** Lead-in idle before the first start bit. */
  idleTicks?: number;
  /** Idle after the last stop bit. Defaults to two bit periods. */
  trailingTicks?: number;
  /** Indices of bytes whose stop bit is driven low. */
  badStop?: number[];
}

export interface DecodedFrame {
  value: number;
  frameError: boolean;
  /** Tick of the start bit's falling edge. */
  startTick: number;
}

export class SerialBits {
  /**
   * Build an 8N1 bit sequence for the given bytes.
   * Polarity: idle = 1, start bit = 0, data bits LSB first, stop = 1.
   */
  static buildBits(bytes: number[], ticksPerBit: number, options: BuildOptions = {}): SerialBit[] {
    if (!Number.isInteger(ticksPerBit) || ticksPerBit < 1) {
      throw new RangeError(`ticksPerBit must be a positive integer, got ${ticksPerBit}`);
    }
    const bits: SerialBit[] = [];
    const badStop = new Set(options.badStop ?? []);

    const push = (level: Bit, ticks: number) => {
      if (ticks <= 0) return;
      const last = bits[bits.length - 1];
      if (last !== undefined && last.level === level) {
        last.ticks += ticks;
      } else {
        bits.push({ level, ticks });
      }
    };

    push(1, options.idleTicks ?? 0);

    bytes.forEach((byte, index) => {
      push(0, ticksPerBit);                                // start bit
      for (let bit = 0; bit < DATA_BITS; bit++) {
        push(bitAt(byte, bit), ticksPerBit);
      }
      push(badStop.has(index) ? 0 : 1, ticksPerBit);       // stop bit
    });

    push(1, options.trailingTicks ?? ticksPerBit * 2);
    return bits;
  }

  static totalTicks(bits: SerialBit[]): number {
    return bits.reduce((sum, seg) => sum + seg.ticks, 0);
  }

  /** Expand segments into one level per tick. */
  static toLevels(bits: SerialBit[]): Bit[] {
    const levels: Bit[] = [];
    for (const seg of bits) {
      for (let i = 0; i < seg.ticks; i++) levels.push(seg.level);
    }
    return levels;
  }

  /**
   * Decode a bit sequence into frames. Finds each 1->0 edge, samples the data
   * bits and the stop bit at their centres, then looks for the next edge from
   * the stop bit's centre on.
   */
  static decodeFrames(bits: SerialBit[], ticksPerBit: number): DecodedFrame[] {
    const frames: DecodedFrame[] = [];
    const starts: number[] = [];
    let total = 0;
    for (const seg of bits) {
      starts.push(total);
      total += seg.ticks;
    }

    const sampleAt = (t: number): Bit => {
      for (let i = bits.length - 1; i >= 0; i--) {
        if (t >= starts[i]) return t < starts[i] + bits[i].ticks ? bits[i].level : 1;
      }
      return 1;
    };

    // The line is taken to idle high before the first segment.
    const findFallingEdge = (from: number): number => {
      let previous: Bit = 1;
      for (let i = 0; i < bits.length; i++) {
        if (bits[i].level === 0 && previous === 1 && starts[i] >= from) return starts[i];
        previous = bits[i].level;
      }
      return total;
    };

    const half = ticksPerBit / 2;
    let t = findFallingEdge(0);
    while (t + ticksPerBit * (BITS_PER_FRAME - 1) + half <= total) {
      let value = 0;
      for (let bit = 0; bit < DATA_BITS; bit++) {
        value |= sampleAt(t + ticksPerBit * (bit + 1) + half) << bit;
      }
      const stopCentre = t + ticksPerBit * (BITS_PER_FRAME - 1) + half;
      frames.push({ value, frameError: sampleAt(stopCentre) === 0, startTick: t });
      t = findFallingEdge(stopCentre);
    }
    return frames;
  }

  /** Decode a bit sequence back to bytes. */
  static decodeBits(bits: SerialBit[], ticksPerBit: number): number[] {
    return SerialBits.decodeFrames(bits, ticksPerBit).map(frame => frame.value);
  }
}

/**
 * Plays a segment list onto a line, one level per wire tick, then idles high.
 */
export class SerialDriver {
  private readonly bits: SerialBit[];
  private segment = 0;
  private offset = 0;
  private _played = 0;

  constructor(bits: SerialBit[]) {
    this.bits = bits;
  }

  get done(): boolean {
    return this.segment >= this.bits.length;
  }

  /** Ticks played so far. */
  get played(): number {
    return this._played;
  }

  /** Level for the current tick; advances by one tick. */
  next(): Bit {
    while (this.segment < this.bits.length && this.offset >= this.bits[this.segment].ticks) {
      this.segment++;
      this.offset = 0;
    }
    if (this.done) return 1;
    const level = this.bits[this.segment].level;
    this.offset++;
    this._played++;
    if (this.offset >= this.bits[this.segment].ticks) {
      this.segment++;
      this.offset = 0;
    }
    return level;
  }
}
