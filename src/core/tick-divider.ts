/**
 * Baud generator: a down-counter that emits a one-tick enable pulse every
 * `divisor` counted ticks.
 *
 * Two dividers chain into the UART timing: the first turns wire-clock ticks
 * into 16x sample ticks, the second counts only sample ticks (`advance`) and
 * produces the bit-rate pulse for the framer.
 */

export interface DividerInput {
  enable: boolean;
  divisor: number;
  /** Count this tick. Defaults to true (count every domain tick). */
  advance?: boolean;
}

export class TickDivider {
  private counter = 0;
  private _pulse = false;
  private _pulses = 0;

  /** Registered enable pulse from the last tick. */
  get pulse(): boolean {
    return this._pulse;
  }

  get count(): number {
    return this.counter;
  }

  /** Pulses emitted since reset. */
  get pulses(): number {
    return this._pulses;
  }

  /**
   * A divisor change while running is applied to whatever the counter holds;
   * the next pulse comes when it reaches zero, not after a fresh reload.
   */
  tick(input: DividerInput): void {
    if (!input.enable || input.divisor <= 0) {
      this.counter = 0;
      this._pulse = false;
      return;
    }
    if (input.advance === false) {
      this._pulse = false;
      return;
    }
    if (this.counter === 0) {
      this._pulse = true;
      this._pulses++;
      this.counter = input.divisor - 1;
    } else {
      this._pulse = false;
      this.counter--;
    }
  }

  reset(): void {
    this.counter = 0;
    this._pulse = false;
    this._pulses = 0;
  }
}
