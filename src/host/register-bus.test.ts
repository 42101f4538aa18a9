import { describe, it, expect } from 'vitest';
import { UartSystem } from './uart-system';
import { BusError } from './register-bus';

function system(): UartSystem {
  return new UartSystem({ controlClockHz: 20_000_000, wireClockHz: 5_000_000 });
}

describe('RegisterBus', () => {
  it('reads reset values by name and by address', () => {
    const sys = system();
    expect(sys.bus.readRegister('STATUS')).toBe(0x05);
    expect(sys.bus.read(0x10)).toBe(4);
  });

  it('writes and reads back CTRL', () => {
    const sys = system();
    sys.bus.writeRegister('CTRL', 0xFF);
    expect(sys.bus.readRegister('CTRL')).toBe(0x03);
  });

  it('spends one control tick per access', () => {
    const sys = system();
    sys.bus.read(0x00);
    const before = sys.scheduler.ticks(sys.controlDomain);
    sys.bus.read(0x04);
    sys.bus.write(0x14, 1);
    expect(sys.scheduler.ticks(sys.controlDomain) - before).toBe(2);
    expect(sys.bus.transactions).toBe(3);
  });

  it('throws BusError for an unmapped register', () => {
    const sys = system();
    let caught: unknown;
    try {
      sys.bus.read(0x20);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BusError);
    expect(caught instanceof BusError && caught.address).toBe(0x20);
    expect(caught instanceof Error && caught.message).toBe('Bus error at address 0x20');
  });

  it('rejects misaligned and negative addresses', () => {
    const sys = system();
    expect(() => sys.bus.read(0x05)).toThrow(RangeError);
    expect(() => sys.bus.write(-4, 0)).toThrow(RangeError);
    expect(sys.bus.transactions).toBe(0);
  });
});
