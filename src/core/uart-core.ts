/**
 * UART core with two clock domains.
 *
 *   control domain:  RegisterFile, TX buffer write side, RX buffer read side,
 *                    RX prefetch register
 *   wire domain:     baud dividers, TX buffer read side, TX prefetch, Framer,
 *                    RX line synchronizer, Deframer, RX buffer write side
 *
 * The host drives each domain by calling `advanceControlDomain()` and
 * `advanceWireDomain()` in any interleaving. Each call first gathers every
 * input from registered state, then ticks all components of that domain, so
 * the order of component ticks inside a call never matters.
 *
 * Nothing reads the other domain's state directly except through a
 * synchronizer owned by the reading side:
 *
 *   ctrl            control -> wire   MultiBitSync
 *   baud divisor    control -> wire   GraySync (quasi-static)
 *   TX FIFO reset   control -> wire   PulseSync with ack
 *   active flags    wire -> control   MultiBitSync
 *   frame error     wire -> control   PulseSync
 *   FRAME_ERR clear control -> wire   PulseSync
 *   overrun         wire -> control   PulseSync
 *   buffer indices  both ways         GraySync inside CrossDomainBuffer
 */
import {
  CTRL, DEFAULT_BAUD_DIVISOR, DEFAULT_FIFO_DEPTH, DEFAULT_SYNC_STAGES,
  BAUD_DIVISOR_WIDTH, OVERSAMPLE,
} from './constants';
import { CrossDomainBuffer } from './cross-domain-buffer';
import { Deframer } from './deframer';
import { Framer } from './framer';
import { PrefetchRegister } from './prefetch-register';
import { RegisterFile, IDLE_ACCESS } from './register-file';
import { BitSync, GraySync, MultiBitSync, PulseSync } from './sync';
import { TickDivider } from './tick-divider';
import { FetchState } from './types';
import type {
  Bit, MetastabilityResolver, RegisterAccess, RegisterResponse, StatusFlags, UartSnapshot,
} from './types';

export interface UartCoreOptions {
  /** Slots per direction. Power of two, at least 2. */
  fifoDepth?: number;
  /** Flip-flop stages in every level and Gray synchronizer. */
  syncStages?: number;
  /** BAUD_DIV value after reset. */
  resetDivisor?: number;
  /** Metastability model applied to every synchronizer's first stage. */
  resolver?: MetastabilityResolver | null;
}

const ACTIVE_TX = 1 << 0;
const ACTIVE_RX = 1 << 1;

export class UartCore {
  readonly fifoDepth: number;
  readonly syncStages: number;

  // ---- Control domain ----
  private readonly regs: RegisterFile;
  private readonly rxPrefetch: PrefetchRegister<number>;
  private readonly activeSync: MultiBitSync;
  private _controlTicks = 0;
  private _txDropped = 0;

  // ---- Wire domain ----
  private readonly ctrlSync: MultiBitSync;
  private readonly divisorSync: GraySync;
  private readonly rxSync: BitSync;
  private readonly sampleDivider = new TickDivider();
  private readonly bitDivider = new TickDivider();
  private readonly txPrefetch: PrefetchRegister<number>;
  private readonly framer = new Framer();
  private readonly deframer = new Deframer();
  private _wireTicks = 0;
  private _overruns = 0;
  private _rxLine: Bit = 1;

  // ---- Crossings ----
  private readonly txBuffer: CrossDomainBuffer<number>;
  private readonly rxBuffer: CrossDomainBuffer<number>;
  private readonly txResetSync: PulseSync;
  private readonly frameErrorSync: PulseSync;
  private readonly frameErrorClearSync: PulseSync;
  private readonly overrunSync: PulseSync;

  constructor(options: UartCoreOptions = {}) {
    this.fifoDepth = options.fifoDepth ?? DEFAULT_FIFO_DEPTH;
    this.syncStages = options.syncStages ?? DEFAULT_SYNC_STAGES;
    const resolver = options.resolver ?? null;
    const resetDivisor = options.resetDivisor ?? DEFAULT_BAUD_DIVISOR;
    const bufferOptions = { stages: this.syncStages, resolver };

    this.regs = new RegisterFile(resetDivisor);
    this.rxPrefetch = new PrefetchRegister(0);
    this.activeSync = new MultiBitSync(2, this.syncStages, 0, resolver);

    this.ctrlSync = new MultiBitSync(2, this.syncStages, 0, resolver);
    this.divisorSync = new GraySync(BAUD_DIVISOR_WIDTH, this.syncStages, this.regs.baudDivisor, resolver);
    this.rxSync = new BitSync(this.syncStages, 1, resolver);
    this.txPrefetch = new PrefetchRegister(0);

    this.txBuffer = new CrossDomainBuffer(this.fifoDepth, 0, bufferOptions);
    this.rxBuffer = new CrossDomainBuffer(this.fifoDepth, 0, bufferOptions);
    this.txResetSync = new PulseSync(true, resolver);
    this.frameErrorSync = new PulseSync(false, resolver);
    this.frameErrorClearSync = new PulseSync(false, resolver);
    this.overrunSync = new PulseSync(false, resolver);
  }

  // ========================================================================
  // Pins
  // ========================================================================

  /** Serial output, registered in the wire domain. Idles at 1. */
  get txLine(): Bit {
    return this.framer.serial;
  }

  /** Serial input as last driven by the host. */
  get rxLine(): Bit {
    return this._rxLine;
  }

  /** Drive the asynchronous RX input. Sampled on the next wire tick. */
  setRxLine(level: Bit): void {
    this._rxLine = level;
  }

  get irq(): boolean {
    return this.regs.irq;
  }

  get controlTicks(): number {
    return this._controlTicks;
  }

  get wireTicks(): number {
    return this._wireTicks;
  }

  /** TX_DATA writes ignored because the TX buffer looked full. */
  get txDropped(): number {
    return this._txDropped;
  }

  /** Received bytes discarded because the RX buffer looked full. */
  get overruns(): number {
    return this._overruns;
  }

  /** Status flags as the control domain currently sees them. */
  status(): StatusFlags {
    const active = this.activeSync.output;
    const rxValid = this.rxPrefetch.valid;
    return {
      txEmpty: this.txBuffer.isEmptyAtWrite(),
      txFull: this.txBuffer.isFullAtWrite(),
      rxEmpty: !rxValid,
      rxFull: this.rxBuffer.isFullAtRead(),
      txActive: (active & ACTIVE_TX) !== 0,
      rxActive: (active & ACTIVE_RX) !== 0,
      frameError: this.regs.frameError,
      overrunError: this.regs.overrunError,
      txLevel: this.txBuffer.writeLevel(),
      rxLevel: this.rxBuffer.readLevel() + (rxValid ? 1 : 0),
    };
  }

  // ========================================================================
  // Control domain
  // ========================================================================

  /** One control-clock tick carrying at most one register access. */
  advanceControlDomain(access: RegisterAccess = IDLE_ACCESS): RegisterResponse {
    // Gather
    const rxEnabled = (this.regs.ctrl & CTRL.RX_EN) !== 0;
    const rxFlush = this.regs.rxFifoReset;
    const txFlush = this.regs.txFifoReset;
    const frameErrorClear = this.regs.frameErrorClear;
    const rxValid = this.rxPrefetch.valid;
    const txWrite = this.regs.txWrite(access);
    const prefetchInput = {
      enabled: rxEnabled && !rxFlush && !this.rxBuffer.draining,
      sourceEmpty: this.rxBuffer.isEmptyAtRead(),
      sourceData: this.rxBuffer.readData,
      consume: this.regs.rxConsume(access, rxValid),
    };
    const rxRead = this.rxPrefetch.readEnable(prefetchInput);
    const status = this.status();
    const frameErrorEvent = this.frameErrorSync.pulse;
    const overrunEvent = this.overrunSync.pulse;

    // Tick
    const response = this.regs.tick({
      access,
      status,
      rxValue: this.rxPrefetch.value,
      rxValid,
      frameErrorEvent,
      overrunEvent,
    });
    if (!this.txBuffer.tickWrite(txWrite)) this._txDropped++;
    this.rxBuffer.tickRead({ read: rxRead, flush: rxFlush });
    this.rxPrefetch.tick(prefetchInput);
    this.activeSync.tick(this.wireActive());
    this.frameErrorSync.tickDestination();
    this.overrunSync.tickDestination();
    this.txResetSync.tickSource(txFlush);
    this.frameErrorClearSync.tickSource(frameErrorClear);

    this._controlTicks++;
    return response;
  }

  private wireActive(): number {
    let active = 0;
    if (this.framer.busy || this.txPrefetch.fetchState !== FetchState.IDLE) active |= ACTIVE_TX;
    if (this.deframer.active) active |= ACTIVE_RX;
    return active;
  }

  // ========================================================================
  // Wire domain
  // ========================================================================

  /** One wire-clock tick. */
  advanceWireDomain(): void {
    // Gather
    const ctrl = this.ctrlSync.output;
    const txEnabled = (ctrl & CTRL.TX_EN) !== 0;
    const rxEnabled = (ctrl & CTRL.RX_EN) !== 0;
    const divisor = this.divisorSync.output;
    const sampleTick = this.sampleDivider.pulse;
    const bitTick = this.bitDivider.pulse;
    const txFlush = this.txResetSync.pulse;

    const framerInput = {
      bitTick,
      valid: txEnabled && this.txPrefetch.valid,
      data: this.txPrefetch.value,
    };
    const prefetchInput = {
      enabled: txEnabled && !txFlush && !this.txBuffer.draining,
      sourceEmpty: this.txBuffer.isEmptyAtRead(),
      sourceData: this.txBuffer.readData,
      consume: this.framer.willAccept(framerInput),
    };
    const txRead = this.txPrefetch.readEnable(prefetchInput);

    const received = this.deframer.valid;
    const overrun = received && this.rxBuffer.isFullAtWrite();
    const rxWrite = received && !overrun ? this.deframer.data : undefined;
    const frameErrorEvent = this.deframer.frameErrorEvent;
    const clearFrameError = this.frameErrorClearSync.pulse;
    const rxSerial = this.rxSync.output;

    // Tick
    // CTRL and BAUD_DIV are registers of the control domain; sampling them
    // here is the first synchronizer stage.
    this.ctrlSync.tick(this.regs.ctrl);
    this.divisorSync.tick(this.regs.baudDivisor);
    this.sampleDivider.tick({ enable: txEnabled || rxEnabled, divisor });
    this.bitDivider.tick({ enable: txEnabled, divisor: OVERSAMPLE, advance: sampleTick });
    this.txBuffer.tickRead({ read: txRead, flush: txFlush });
    this.txPrefetch.tick(prefetchInput);
    this.framer.tick(framerInput);
    if (rxEnabled) {
      this.deframer.tick({ sampleTick, serial: rxSerial, ack: received, clearFrameError });
    } else {
      this.deframer.abort();
      if (clearFrameError) this.deframer.clearFrameError();
    }
    this.rxBuffer.tickWrite(rxWrite);
    this.rxSync.tick(this._rxLine);
    this.frameErrorSync.tickSource(frameErrorEvent);
    this.overrunSync.tickSource(overrun);
    this.txResetSync.tickDestination();
    this.frameErrorClearSync.tickDestination();

    if (overrun) this._overruns++;
    this._wireTicks++;
  }

  // ========================================================================
  // Reset / inspection
  // ========================================================================

  /** Power-on reset of both domains. */
  reset(): void {
    this.regs.reset();
    this.rxPrefetch.reset();
    this.activeSync.reset();
    this.ctrlSync.reset();
    this.divisorSync.reset();
    this.rxSync.reset();
    this.sampleDivider.reset();
    this.bitDivider.reset();
    this.txPrefetch.reset();
    this.framer.reset();
    this.deframer.reset();
    this.txBuffer.reset();
    this.rxBuffer.reset();
    this.txResetSync.reset();
    this.frameErrorSync.reset();
    this.frameErrorClearSync.reset();
    this.overrunSync.reset();
    this._rxLine = 1;
    this._controlTicks = 0;
    this._wireTicks = 0;
    this._txDropped = 0;
    this._overruns = 0;
  }

  getSnapshot(): UartSnapshot {
    return {
      controlTicks: this._controlTicks,
      wireTicks: this._wireTicks,
      ctrl: this.regs.ctrl,
      baudDivisor: this.regs.baudDivisor,
      intEnable: this.regs.intEnable,
      intStatus: this.regs.intStatus,
      irq: this.regs.irq,
      status: this.status(),
      txLine: this.framer.serial,
      rxLine: this._rxLine,
      framer: this.framer.getSnapshot(),
      deframer: this.deframer.getSnapshot(),
      rxPrefetch: this.rxPrefetch.getSnapshot(),
      txPrefetch: this.txPrefetch.getSnapshot(),
    };
  }
}
