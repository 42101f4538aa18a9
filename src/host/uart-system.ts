/**
 * A UartCore wired to a scheduler: control and wire clocks, register bus,
 * RX line source and TX line trace. Several systems may share one scheduler.
 */
import { CTRL, DEFAULT_BAUD_DIVISOR, OVERSAMPLE, REFERENCE_WIRE_CLOCK_HZ } from '../core/constants';
import { decodeStatus } from '../core/register-file';
import { ClockScheduler, SimulationTimeoutError } from '../core/scheduler';
import { SerialBits, SerialDriver } from '../core/serial';
import type { SerialBit, DecodedFrame } from '../core/serial';
import { UartCore } from '../core/uart-core';
import type { UartCoreOptions } from '../core/uart-core';
import type { Bit, StatusFlags } from '../core/types';
import { LineTrace } from './line-trace';
import { RegisterBus, DEFAULT_BUS_TIMEOUT_NS } from './register-bus';

export const DEFAULT_CONTROL_CLOCK_HZ = 50_000_000;

export interface UartSystemOptions extends UartCoreOptions {
  name?: string;
  controlClockHz?: number;
  wireClockHz?: number;
  /** Share a scheduler with other systems. */
  scheduler?: ClockScheduler;
  traceCapacity?: number;
  busTimeoutNS?: number;
}

export interface ConfigureOptions {
  divisor?: number;
  txEnable?: boolean;
  rxEnable?: boolean;
  intEnable?: number;
}

export class UartSystem {
  readonly name: string;
  readonly core: UartCore;
  readonly scheduler: ClockScheduler;
  readonly bus: RegisterBus;
  readonly txTrace: LineTrace;
  readonly controlDomain: number;
  readonly wireDomain: number;

  private rxSource: (() => Bit) | null = null;
  private driver: SerialDriver | null = null;
  private divisor: number;

  constructor(options: UartSystemOptions = {}) {
    this.name = options.name ?? 'uart';
    this.core = new UartCore(options);
    this.scheduler = options.scheduler ?? new ClockScheduler();
    this.bus = new RegisterBus(this.core, this.scheduler, options.busTimeoutNS ?? DEFAULT_BUS_TIMEOUT_NS);
    this.txTrace = new LineTrace(options.traceCapacity);
    this.divisor = options.resetDivisor ?? DEFAULT_BAUD_DIVISOR;

    const controlHz = options.controlClockHz ?? DEFAULT_CONTROL_CLOCK_HZ;
    const wireHz = options.wireClockHz ?? REFERENCE_WIRE_CLOCK_HZ;
    this.controlDomain = this.scheduler.addDomain(`${this.name}.control`, 1e9 / controlHz, () => this.bus.tickControl());
    this.wireDomain = this.scheduler.addDomain(`${this.name}.wire`, 1e9 / wireHz, () => this.tickWire());
  }

  /** Wire ticks per serial bit at the last configured divisor. */
  get ticksPerBit(): number {
    return this.divisor * OVERSAMPLE;
  }

  private tickWire(): void {
    let level: Bit = 1;
    if (this.driver !== null) level = this.driver.next();
    else if (this.rxSource !== null) level = this.rxSource();
    this.core.setRxLine(level);
    this.core.advanceWireDomain();
    this.txTrace.record(this.core.wireTicks, this.core.txLine);
  }

  // ========================================================================
  // RX line sources
  // ========================================================================

  /** Drive RX from another line each wire tick (e.g. a peer's TX). */
  connectRx(source: () => Bit): void {
    this.rxSource = source;
    this.driver = null;
  }

  /** Feed TX straight back into RX. */
  loopback(): void {
    this.connectRx(() => this.core.txLine);
  }

  /** Play a prepared bit sequence onto RX, then idle high. */
  play(bits: SerialBit[]): SerialDriver {
    this.driver = new SerialDriver(bits);
    return this.driver;
  }

  // ========================================================================
  // Register-level helpers
  // ========================================================================

  configure(options: ConfigureOptions): void {
    if (options.divisor !== undefined) {
      this.bus.writeRegister('BAUD_DIV', options.divisor);
      this.divisor = options.divisor;
    }
    if (options.intEnable !== undefined) this.bus.writeRegister('INT_ENABLE', options.intEnable);
    let ctrl = 0;
    if (options.txEnable ?? true) ctrl |= CTRL.TX_EN;
    if (options.rxEnable ?? true) ctrl |= CTRL.RX_EN;
    this.bus.writeRegister('CTRL', ctrl);
  }

  status(): StatusFlags {
    return decodeStatus(this.bus.readRegister('STATUS'));
  }

  /** Write bytes to TX_DATA, waiting for space whenever the buffer is full. */
  send(bytes: number[], timeoutNS: number = this.frameTimeNS() * (bytes.length + 4)): void {
    const deadline = this.scheduler.now + timeoutNS;
    for (const byte of bytes) {
      this.poll(status => !status.txFull, deadline, timeoutNS, 'TX space');
      this.bus.writeRegister('TX_DATA', byte);
    }
  }

  /** Read `count` bytes from RX_DATA, polling STATUS between reads. */
  receive(count: number, timeoutNS: number = this.frameTimeNS() * (count + 4)): number[] {
    const deadline = this.scheduler.now + timeoutNS;
    const bytes: number[] = [];
    while (bytes.length < count) {
      this.poll(status => !status.rxEmpty, deadline, timeoutNS, 'RX data');
      bytes.push(this.bus.readRegister('RX_DATA'));
    }
    return bytes;
  }

  /** Wait until the TX buffer is drained and the framer is idle. */
  waitTxIdle(timeoutNS: number = this.frameTimeNS() * (this.core.fifoDepth + 4)): void {
    const deadline = this.scheduler.now + timeoutNS;
    this.poll(status => status.txEmpty && !status.txActive, deadline, timeoutNS, 'TX idle');
  }

  /** Read STATUS until `condition` holds. Every read costs one control tick. */
  private poll(
    condition: (status: StatusFlags) => boolean,
    deadline: number,
    timeoutNS: number,
    what: string,
  ): StatusFlags {
    for (;;) {
      const status = this.status();
      if (condition(status)) return status;
      if (this.scheduler.now > deadline) {
        throw new SimulationTimeoutError(`${this.name}: timed out waiting for ${what}`, timeoutNS);
      }
    }
  }

  /** Decode everything sent on TX so far. */
  transmitted(): DecodedFrame[] {
    return SerialBits.decodeFrames(this.txTrace.toSegments(this.core.wireTicks), this.ticksPerBit);
  }

  /** One 10-bit frame in ns at the current clocks and divisor. */
  frameTimeNS(): number {
    return this.scheduler.domain(this.wireDomain).periodNS * this.ticksPerBit * 10;
  }
}
