import { describe, it, expect } from 'vitest';
import { RegisterFile, IDLE_ACCESS, encodeStatus, decodeStatus } from './register-file';
import type { RegisterTickInput } from './register-file';
import { REG, INT, CTRL } from './constants';
import type { RegisterAccess, StatusFlags } from './types';

// ============================================================================
// Test helpers
// ============================================================================

function flags(over: Partial<StatusFlags> = {}): StatusFlags {
  return {
    txEmpty: true, txFull: false, rxEmpty: true, rxFull: false,
    txActive: false, rxActive: false, frameError: false, overrunError: false,
    txLevel: 0, rxLevel: 0,
    ...over,
  };
}

const read = (address: number): RegisterAccess =>
  ({ address, readEnable: true, writeEnable: false, writeData: 0 });
const write = (address: number, writeData: number): RegisterAccess =>
  ({ address, readEnable: false, writeEnable: true, writeData });

function tick(
  regs: RegisterFile,
  access: RegisterAccess = IDLE_ACCESS,
  extra: Partial<Omit<RegisterTickInput, 'access'>> = {},
) {
  return regs.tick({
    access,
    status: flags(),
    rxValue: 0,
    rxValid: false,
    frameErrorEvent: false,
    overrunEvent: false,
    ...extra,
  });
}

// ============================================================================
// Tests
// ============================================================================

describe('RegisterFile', () => {
  it('comes out of reset with divisor 4 and everything else clear', () => {
    const regs = new RegisterFile();
    expect(tick(regs, read(REG.CTRL)).readData).toBe(0);
    expect(tick(regs, read(REG.BAUD_DIV)).readData).toBe(4);
    expect(tick(regs, read(REG.INT_ENABLE)).readData).toBe(0);
    expect(tick(regs, read(REG.INT_STATUS)).readData).toBe(0);
    expect(regs.irq).toBe(false);
  });

  it('masks writes to their defined bits', () => {
    const regs = new RegisterFile();
    tick(regs, write(REG.CTRL, 0xFF));
    tick(regs, write(REG.BAUD_DIV, 0x12345));
    tick(regs, write(REG.INT_ENABLE, 0xFF));
    expect(tick(regs, read(REG.CTRL)).readData).toBe(CTRL.TX_EN | CTRL.RX_EN);
    expect(tick(regs, read(REG.BAUD_DIV)).readData).toBe(0x2345);
    expect(tick(regs, read(REG.INT_ENABLE)).readData).toBe(0xF);
  });

  it('reads zero from write-only registers and ignores writes to read-only ones', () => {
    const regs = new RegisterFile();
    expect(tick(regs, read(REG.TX_DATA)).readData).toBe(0);
    expect(tick(regs, read(REG.FIFO_CTRL)).readData).toBe(0);
    expect(tick(regs, write(REG.STATUS, 0xFFFF)).error).toBe(false);
    expect(tick(regs, read(REG.STATUS)).readData).toBe(encodeStatus(flags()));
  });

  it('returns the held RX byte only while it is valid', () => {
    const regs = new RegisterFile();
    expect(tick(regs, read(REG.RX_DATA), { rxValue: 0x1A5, rxValid: true }).readData).toBe(0xA5);
    expect(tick(regs, read(REG.RX_DATA), { rxValue: 0x5A, rxValid: false }).readData).toBe(0);
    expect(regs.rxConsume(read(REG.RX_DATA), true)).toBe(true);
    expect(regs.rxConsume(read(REG.RX_DATA), false)).toBe(false);
  });

  it('passes TX_DATA writes through as bytes', () => {
    const regs = new RegisterFile();
    expect(regs.txWrite(write(REG.TX_DATA, 0x1FF))).toBe(0xFF);
    expect(regs.txWrite(write(REG.CTRL, 1))).toBeUndefined();
    expect(regs.txWrite(read(REG.TX_DATA))).toBeUndefined();
  });

  it('flags accesses outside the map for one tick', () => {
    const regs = new RegisterFile();
    expect(tick(regs, read(8))).toEqual({ readData: 0, error: true });
    expect(tick(regs, write(12, 1)).error).toBe(true);
    expect(tick(regs).error).toBe(false);
  });

  it('pulses the FIFO resets for exactly one tick', () => {
    const regs = new RegisterFile();
    tick(regs, write(REG.FIFO_CTRL, 0x3));
    expect(regs.txFifoReset).toBe(true);
    expect(regs.rxFifoReset).toBe(true);
    tick(regs);
    expect(regs.txFifoReset).toBe(false);
    expect(regs.rxFifoReset).toBe(false);
  });

  it('strobes frameErrorClear for one tick when FRAME_ERR is written 1', () => {
    const regs = new RegisterFile();
    tick(regs, IDLE_ACCESS, { frameErrorEvent: true });
    tick(regs, write(REG.INT_STATUS, INT.OVERRUN));
    expect(regs.frameErrorClear).toBe(false);
    tick(regs, write(REG.INT_STATUS, INT.FRAME_ERR));
    expect(regs.frameErrorClear).toBe(true);
    expect(regs.frameError).toBe(false);
    tick(regs);
    expect(regs.frameErrorClear).toBe(false);
  });

  it('latches events and clears them only by writing 1', () => {
    const regs = new RegisterFile();
    tick(regs, IDLE_ACCESS, { frameErrorEvent: true });
    expect(regs.intStatus).toBe(INT.FRAME_ERR);
    expect(regs.frameError).toBe(true);

    tick(regs, write(REG.INT_STATUS, INT.OVERRUN));
    expect(regs.intStatus).toBe(INT.FRAME_ERR);

    tick(regs, write(REG.INT_STATUS, INT.FRAME_ERR));
    expect(regs.intStatus).toBe(0);
  });

  it('keeps an event that arrives on the clearing tick', () => {
    const regs = new RegisterFile();
    tick(regs, IDLE_ACCESS, { overrunEvent: true });
    tick(regs, write(REG.INT_STATUS, INT.OVERRUN), { overrunEvent: true });
    expect(regs.overrunError).toBe(true);
  });

  it('raises TX_READY when the TX buffer becomes empty and RX_READY when data arrives', () => {
    const regs = new RegisterFile();
    tick(regs, IDLE_ACCESS, { status: flags({ txEmpty: false }) });
    expect(regs.intStatus).toBe(0);
    tick(regs, IDLE_ACCESS, { status: flags({ txEmpty: true }) });
    expect(regs.intStatus).toBe(INT.TX_READY);

    tick(regs, IDLE_ACCESS, { rxValid: true });
    expect(regs.intStatus).toBe(INT.TX_READY | INT.RX_READY);
  });

  it('gates irq by INT_ENABLE', () => {
    const regs = new RegisterFile();
    tick(regs, IDLE_ACCESS, { rxValid: true });
    expect(regs.irq).toBe(false);
    tick(regs, write(REG.INT_ENABLE, INT.TX_READY), { rxValid: true });
    expect(regs.irq).toBe(false);
    tick(regs, write(REG.INT_ENABLE, INT.RX_READY), { rxValid: true });
    expect(regs.irq).toBe(true);
  });

  it('resets to its configured divisor', () => {
    const regs = new RegisterFile(12);
    tick(regs, write(REG.BAUD_DIV, 3));
    tick(regs, write(REG.CTRL, 3));
    regs.reset();
    expect(regs.baudDivisor).toBe(12);
    expect(regs.ctrl).toBe(0);
  });
});

describe('STATUS encoding', () => {
  it('packs flags and levels', () => {
    const word = encodeStatus(flags({ frameError: true, txLevel: 3, rxLevel: 9 }));
    expect(word).toBe(0x090345);
    expect(decodeStatus(word)).toEqual(flags({ frameError: true, txLevel: 3, rxLevel: 9 }));
  });
});
