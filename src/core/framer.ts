/**
 * Transmit state machine: start bit, 8 data bits LSB first, one stop bit.
 *
 *   IDLE --(bit tick, byte pending)--> START --> DATA x8 --> STOP --> IDLE
 *
 * Every transition happens on a bit tick; between ticks the line holds.
 * A byte pending when STOP ends is latched on that same tick, so frames can
 * run back to back without an idle bit between them.
 */
import { DATA_BITS } from './constants';
import { bitAt } from './gray';
import { BYTE_MASK, FramerPhase } from './types';
import type { Bit, FramerSnapshot } from './types';

export interface FramerInput {
  bitTick: boolean;
  /** A byte is offered this tick. */
  valid: boolean;
  data: number;
}

export class Framer {
  private phase: FramerPhase = FramerPhase.IDLE;
  private bitIndex = 0;
  private shift = 0;
  private _serial: Bit = 1;
  private _accepted = false;
  private _frames = 0;

  /** Registered TX line. */
  get serial(): Bit {
    return this._serial;
  }

  /** Can take a new byte. */
  get ready(): boolean {
    return this.phase === FramerPhase.IDLE;
  }

  get busy(): boolean {
    return this.phase !== FramerPhase.IDLE;
  }

  /** Consumer-ready handshake for the byte offered this tick. */
  willAccept(input: FramerInput): boolean {
    return input.bitTick && input.valid
      && (this.phase === FramerPhase.IDLE || this.phase === FramerPhase.STOP);
  }

  /** True for the tick after a byte was latched. */
  get accepted(): boolean {
    return this._accepted;
  }

  /** Frames started since reset. */
  get frames(): number {
    return this._frames;
  }

  tick(input: FramerInput): void {
    this._accepted = false;
    if (!input.bitTick) return;

    switch (this.phase) {
      case FramerPhase.IDLE:
        if (input.valid) this.latch(input.data);
        else this._serial = 1;
        break;

      case FramerPhase.START:
        this.phase = FramerPhase.DATA;
        this.bitIndex = 0;
        this._serial = bitAt(this.shift, 0);
        break;

      case FramerPhase.DATA:
        if (this.bitIndex === DATA_BITS - 1) {
          this.phase = FramerPhase.STOP;
          this._serial = 1;
        } else {
          this.shift >>>= 1;
          this.bitIndex++;
          this._serial = bitAt(this.shift, 0);
        }
        break;

      case FramerPhase.STOP:
        if (input.valid) {
          this.latch(input.data);
        } else {
          this.phase = FramerPhase.IDLE;
          this._serial = 1;
        }
        break;
    }
  }

  private latch(data: number): void {
    this.shift = data & BYTE_MASK;
    this.bitIndex = 0;
    this.phase = FramerPhase.START;
    this._serial = 0;
    this._accepted = true;
    this._frames++;
  }

  reset(): void {
    this.phase = FramerPhase.IDLE;
    this.bitIndex = 0;
    this.shift = 0;
    this._serial = 1;
    this._accepted = false;
    this._frames = 0;
  }

  getSnapshot(): FramerSnapshot {
    return {
      phase: this.phase,
      bitIndex: this.bitIndex,
      shift: this.shift,
      serial: this._serial,
    };
  }
}
