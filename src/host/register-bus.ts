/**
 * Byte-addressed register access on top of the control clock.
 *
 * Each read or write is presented to the core for exactly one control tick;
 * the scheduler runs (ticking every domain it knows) until that tick has
 * happened. Read data is the registered response of that tick.
 */
import { REG_ADDR } from '../core/constants';
import type { RegisterName } from '../core/constants';
import { IDLE_ACCESS } from '../core/register-file';
import type { ClockScheduler } from '../core/scheduler';
import type { UartCore } from '../core/uart-core';
import type { RegisterAccess, RegisterResponse } from '../core/types';

export const DEFAULT_BUS_TIMEOUT_NS = 1_000_000;

export class BusError extends Error {
  readonly address: number;

  constructor(address: number) {
    super(`Bus error at address 0x${address.toString(16).padStart(2, '0')}`);
    this.name = 'BusError';
    this.address = address;
  }
}

export class RegisterBus {
  private readonly core: UartCore;
  private readonly scheduler: ClockScheduler;
  private readonly timeoutNS: number;
  private pending: RegisterAccess | null = null;
  private served = 0;
  private last: RegisterResponse = { readData: 0, error: false };

  constructor(core: UartCore, scheduler: ClockScheduler, timeoutNS: number = DEFAULT_BUS_TIMEOUT_NS) {
    this.core = core;
    this.scheduler = scheduler;
    this.timeoutNS = timeoutNS;
  }

  /** Control-domain tick body. Register it as the control clock's callback. */
  tickControl(): void {
    const access = this.pending ?? IDLE_ACCESS;
    const issued = this.pending !== null;
    this.pending = null;
    this.last = this.core.advanceControlDomain(access);
    if (issued) this.served++;
  }

  /** Accesses completed so far. */
  get transactions(): number {
    return this.served;
  }

  read(address: number): number {
    return this.issue({ address: toIndex(address), readEnable: true, writeEnable: false, writeData: 0 }, address);
  }

  write(address: number, value: number): void {
    this.issue({ address: toIndex(address), readEnable: false, writeEnable: true, writeData: value >>> 0 }, address);
  }

  readRegister(name: RegisterName): number {
    return this.read(REG_ADDR[name]);
  }

  writeRegister(name: RegisterName, value: number): void {
    this.write(REG_ADDR[name], value);
  }

  private issue(access: RegisterAccess, address: number): number {
    if (this.pending !== null) throw new Error('Register access already in flight');
    const before = this.served;
    this.pending = access;
    this.scheduler.runUntil(() => this.served > before, this.timeoutNS);
    if (this.last.error) throw new BusError(address);
    return this.last.readData;
  }
}

function toIndex(address: number): number {
  if (!Number.isInteger(address) || address < 0) {
    throw new RangeError(`Invalid register address: ${address}`);
  }
  if ((address & 3) !== 0) {
    throw new RangeError(`Misaligned register address: 0x${address.toString(16)}`);
  }
  return address >> 2;
}
