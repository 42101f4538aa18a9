/**
 * Receive state machine, clocked by the 16x sample tick.
 *
 *   IDLE --(1->0 edge)--> START_BIT --(count 8 low)--> DATA_BITS x8
 *        --> STOP_BIT --(count 8)--> WAIT_ACK --(ack)--> IDLE
 *
 * The sample counter restarts at 0 on leaving IDLE and wraps 15 -> 0 at each
 * bit boundary. Bits are read at count 8, the bit centre. A start bit that is
 * high again at its centre is a false start: back to IDLE, nothing reported.
 *
 * The byte is committed at the stop-bit sample point and held on `data` with
 * `valid` until the consumer acknowledges it. Returning to IDLE there, half a
 * bit before the stop bit ends, leaves time to see the next start edge of a
 * back-to-back frame.
 */
import { DATA_BITS, OVERSAMPLE, SAMPLE_POINT } from './constants';
import { DeframerPhase } from './types';
import type { Bit, DeframerSnapshot } from './types';

export interface DeframerInput {
  sampleTick: boolean;
  /** Synchronized RX line. */
  serial: Bit;
  /** Consumer takes the presented byte this tick. */
  ack: boolean;
  /** Clear the sticky frame error. */
  clearFrameError?: boolean;
}

export class Deframer {
  private phase: DeframerPhase = DeframerPhase.IDLE;
  private sampleCount = 0;
  private bitIndex = 0;
  private shift = 0;
  private lastSerial: Bit = 1;

  private _data = 0;
  private _valid = false;
  private _frameError = false;
  private _frameErrorEvent = false;
  private _falseStarts = 0;
  private _frames = 0;

  get data(): number {
    return this._data;
  }

  get valid(): boolean {
    return this._valid;
  }

  /** Sticky until cleared. */
  get frameError(): boolean {
    return this._frameError;
  }

  /** One-tick pulse on the tick a bad stop bit was sampled. */
  get frameErrorEvent(): boolean {
    return this._frameErrorEvent;
  }

  get active(): boolean {
    return this.phase !== DeframerPhase.IDLE;
  }

  get falseStarts(): number {
    return this._falseStarts;
  }

  /** Frames committed since reset (including ones with a frame error). */
  get frames(): number {
    return this._frames;
  }

  tick(input: DeframerInput): void {
    this._frameErrorEvent = false;
    if (input.clearFrameError) this.clearFrameError();

    if (this.phase === DeframerPhase.WAIT_ACK && input.ack) {
      this._valid = false;
      this.phase = DeframerPhase.IDLE;
    }

    if (!input.sampleTick) return;

    const serial = input.serial;
    const falling = this.lastSerial === 1 && serial === 0;
    this.lastSerial = serial;

    switch (this.phase) {
      case DeframerPhase.IDLE:
        if (falling) {
          this.phase = DeframerPhase.START_BIT;
          this.sampleCount = 0;
        }
        return;

      case DeframerPhase.START_BIT:
        this.sampleCount = (this.sampleCount + 1) % OVERSAMPLE;
        if (this.sampleCount === SAMPLE_POINT && serial === 1) {
          this._falseStarts++;
          this.phase = DeframerPhase.IDLE;
        } else if (this.sampleCount === OVERSAMPLE - 1) {
          this.phase = DeframerPhase.DATA_BITS;
          this.bitIndex = 0;
          this.shift = 0;
        }
        return;

      case DeframerPhase.DATA_BITS:
        this.sampleCount = (this.sampleCount + 1) % OVERSAMPLE;
        if (this.sampleCount === SAMPLE_POINT) {
          this.shift = (this.shift >>> 1) | (serial << (DATA_BITS - 1));
        } else if (this.sampleCount === OVERSAMPLE - 1) {
          if (this.bitIndex === DATA_BITS - 1) {
            this.phase = DeframerPhase.STOP_BIT;
          } else {
            this.bitIndex++;
          }
        }
        return;

      case DeframerPhase.STOP_BIT:
        this.sampleCount = (this.sampleCount + 1) % OVERSAMPLE;
        if (this.sampleCount === SAMPLE_POINT) {
          if (serial === 0) {
            this._frameError = true;
            this._frameErrorEvent = true;
          }
          this._data = this.shift;
          this._valid = true;
          this._frames++;
          this.phase = DeframerPhase.WAIT_ACK;
        }
        return;

      case DeframerPhase.WAIT_ACK:
        return;
    }
  }

  clearFrameError(): void {
    this._frameError = false;
  }

  /** Drop a frame in progress; counters and the sticky error survive. */
  abort(): void {
    this.phase = DeframerPhase.IDLE;
    this.sampleCount = 0;
    this.bitIndex = 0;
    this.shift = 0;
    this.lastSerial = 1;
    this._valid = false;
    this._frameErrorEvent = false;
  }

  reset(): void {
    this.phase = DeframerPhase.IDLE;
    this.sampleCount = 0;
    this.bitIndex = 0;
    this.shift = 0;
    this.lastSerial = 1;
    this._data = 0;
    this._valid = false;
    this._frameError = false;
    this._frameErrorEvent = false;
    this._falseStarts = 0;
    this._frames = 0;
  }

  getSnapshot(): DeframerSnapshot {
    return {
      phase: this.phase,
      bitIndex: this.bitIndex,
      sampleCount: this.sampleCount,
      shift: this.shift,
      data: this._data,
      valid: this._valid,
      frameError: this._frameError,
      falseStarts: this._falseStarts,
    };
  }
}
