/**
 * Control-domain register file.
 *
 * Holds the software-visible state of the UART: control bits, baud divisor,
 * interrupt enable/status and the one-tick FIFO reset strobes. The sticky
 * error flags live here and nowhere else; STATUS only mirrors them, and the
 * only way to clear them is a write-1-to-clear on INT_STATUS.
 *
 * Each tick takes at most one access. Read data and the error flag are
 * registered: they describe the access of the tick that just ran.
 */
import {
  REG, NUM_REGISTERS, CTRL_MASK, INT, INT_MASK, STATUS, FIFO_CTRL,
  DEFAULT_BAUD_DIVISOR, BAUD_DIVISOR_MASK, STATUS_TX_LEVEL_SHIFT, STATUS_RX_LEVEL_SHIFT,
} from './constants';
import { BYTE_MASK } from './types';
import type { RegisterAccess, RegisterResponse, StatusFlags } from './types';

export const IDLE_ACCESS: RegisterAccess = {
  address: 0,
  readEnable: false,
  writeEnable: false,
  writeData: 0,
};

export interface RegisterTickInput {
  access: RegisterAccess;
  status: StatusFlags;
  /** Held RX value and whether it may be consumed. */
  rxValue: number;
  rxValid: boolean;
  frameErrorEvent: boolean;
  overrunEvent: boolean;
}

export function encodeStatus(flags: StatusFlags): number {
  let word = 0;
  if (flags.txEmpty) word |= STATUS.TX_EMPTY;
  if (flags.txFull) word |= STATUS.TX_FULL;
  if (flags.rxEmpty) word |= STATUS.RX_EMPTY;
  if (flags.rxFull) word |= STATUS.RX_FULL;
  if (flags.txActive) word |= STATUS.TX_ACTIVE;
  if (flags.rxActive) word |= STATUS.RX_ACTIVE;
  if (flags.frameError) word |= STATUS.FRAME_ERROR;
  if (flags.overrunError) word |= STATUS.OVERRUN_ERROR;
  word |= (flags.txLevel & BYTE_MASK) << STATUS_TX_LEVEL_SHIFT;
  word |= (flags.rxLevel & BYTE_MASK) << STATUS_RX_LEVEL_SHIFT;
  return word >>> 0;
}

export function decodeStatus(word: number): StatusFlags {
  return {
    txEmpty: (word & STATUS.TX_EMPTY) !== 0,
    txFull: (word & STATUS.TX_FULL) !== 0,
    rxEmpty: (word & STATUS.RX_EMPTY) !== 0,
    rxFull: (word & STATUS.RX_FULL) !== 0,
    txActive: (word & STATUS.TX_ACTIVE) !== 0,
    rxActive: (word & STATUS.RX_ACTIVE) !== 0,
    frameError: (word & STATUS.FRAME_ERROR) !== 0,
    overrunError: (word & STATUS.OVERRUN_ERROR) !== 0,
    txLevel: (word >>> STATUS_TX_LEVEL_SHIFT) & BYTE_MASK,
    rxLevel: (word >>> STATUS_RX_LEVEL_SHIFT) & BYTE_MASK,
  };
}

export class RegisterFile {
  private readonly resetDivisor: number;

  private _ctrl = 0;
  private _baudDivisor: number;
  private _intEnable = 0;
  private _intStatus = 0;

  private _readData = 0;
  private _error = false;

  // Self-clearing FIFO_CTRL strobes
  private _txFifoReset = false;
  private _rxFifoReset = false;
  // One-tick strobe when FRAME_ERR is cleared, for the receiver's copy
  private _frameErrorClear = false;

  // Edge detectors for the level-triggered interrupt sources
  private lastTxEmpty = true;
  private lastRxValid = false;

  constructor(resetDivisor: number = DEFAULT_BAUD_DIVISOR) {
    this.resetDivisor = resetDivisor & BAUD_DIVISOR_MASK;
    this._baudDivisor = this.resetDivisor;
  }

  get ctrl(): number {
    return this._ctrl;
  }

  get baudDivisor(): number {
    return this._baudDivisor;
  }

  get intEnable(): number {
    return this._intEnable;
  }

  get intStatus(): number {
    return this._intStatus;
  }

  get frameError(): boolean {
    return (this._intStatus & INT.FRAME_ERR) !== 0;
  }

  get overrunError(): boolean {
    return (this._intStatus & INT.OVERRUN) !== 0;
  }

  /** Aggregated interrupt line. */
  get irq(): boolean {
    return (this._intStatus & this._intEnable) !== 0;
  }

  get txFifoReset(): boolean {
    return this._txFifoReset;
  }

  get rxFifoReset(): boolean {
    return this._rxFifoReset;
  }

  get frameErrorClear(): boolean {
    return this._frameErrorClear;
  }

  get response(): RegisterResponse {
    return { readData: this._readData, error: this._error };
  }

  /** Byte pushed to the TX buffer by this access, if any. */
  txWrite(access: RegisterAccess): number | undefined {
    if (!access.writeEnable || access.address !== REG.TX_DATA) return undefined;
    return access.writeData & BYTE_MASK;
  }

  /** Whether this access pops the RX holding register. */
  rxConsume(access: RegisterAccess, rxValid: boolean): boolean {
    return access.readEnable && access.address === REG.RX_DATA && rxValid;
  }

  private readRegister(address: number, input: RegisterTickInput): number {
    switch (address) {
      case REG.CTRL:       return this._ctrl;
      case REG.STATUS:     return encodeStatus(input.status);
      case REG.RX_DATA:    return input.rxValid ? input.rxValue & BYTE_MASK : 0;
      case REG.BAUD_DIV:   return this._baudDivisor;
      case REG.INT_ENABLE: return this._intEnable;
      case REG.INT_STATUS: return this._intStatus;
      default:             return 0; // TX_DATA, FIFO_CTRL and unmapped read as zero
    }
  }

  tick(input: RegisterTickInput): RegisterResponse {
    const { access, status } = input;
    const mapped = access.address >= 0 && access.address < NUM_REGISTERS;

    this._error = (access.readEnable || access.writeEnable) && !mapped;
    this._readData = access.readEnable ? this.readRegister(access.address, input) >>> 0 : 0;
    this._txFifoReset = false;
    this._rxFifoReset = false;
    this._frameErrorClear = false;

    if (access.writeEnable && mapped) {
      const data = access.writeData >>> 0;
      switch (access.address) {
        case REG.CTRL:
          this._ctrl = data & CTRL_MASK;
          break;
        case REG.BAUD_DIV:
          this._baudDivisor = data & BAUD_DIVISOR_MASK;
          break;
        case REG.INT_ENABLE:
          this._intEnable = data & INT_MASK;
          break;
        case REG.INT_STATUS:
          this._intStatus &= ~(data & INT_MASK);
          this._frameErrorClear = (data & INT.FRAME_ERR) !== 0;
          break;
        case REG.FIFO_CTRL:
          this._txFifoReset = (data & FIFO_CTRL.TX_FIFO_RST) !== 0;
          this._rxFifoReset = (data & FIFO_CTRL.RX_FIFO_RST) !== 0;
          break;
        default:
          break; // STATUS and RX_DATA are read-only; TX_DATA goes to the buffer
      }
    }

    // Events latch after the clear so one arriving on the same tick survives.
    let events = 0;
    if (status.txEmpty && !this.lastTxEmpty) events |= INT.TX_READY;
    if (input.rxValid && !this.lastRxValid) events |= INT.RX_READY;
    if (input.frameErrorEvent) events |= INT.FRAME_ERR;
    if (input.overrunEvent) events |= INT.OVERRUN;
    this._intStatus = (this._intStatus | events) & INT_MASK;
    this.lastTxEmpty = status.txEmpty;
    this.lastRxValid = input.rxValid;

    return this.response;
  }

  reset(): void {
    this._ctrl = 0;
    this._baudDivisor = this.resetDivisor;
    this._intEnable = 0;
    this._intStatus = 0;
    this._readData = 0;
    this._error = false;
    this._txFifoReset = false;
    this._rxFifoReset = false;
    this._frameErrorClear = false;
    this.lastTxEmpty = true;
    this.lastRxValid = false;
  }
}
