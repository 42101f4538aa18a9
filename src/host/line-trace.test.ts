import { describe, it, expect } from 'vitest';
import { LineTrace } from './line-trace';
import { SerialBits } from '../core/serial';

describe('LineTrace', () => {
  it('stores only level changes', () => {
    const trace = new LineTrace();
    trace.record(0, 1);
    trace.record(5, 0);
    trace.record(6, 0);
    trace.record(9, 1);
    expect(trace.length).toBe(2);
    expect(trace.level).toBe(1);
    expect(trace.transitions()).toEqual([{ tick: 5, level: 0 }, { tick: 9, level: 1 }]);
    expect(trace.toSegments(12)).toEqual([
      { level: 1, ticks: 5 },
      { level: 0, ticks: 4 },
      { level: 1, ticks: 3 },
    ]);
  });

  it('keeps the newest transitions when it wraps', () => {
    const trace = new LineTrace(2);
    trace.record(1, 0);
    trace.record(2, 1);
    trace.record(3, 0);
    expect(trace.dropped).toBe(1);
    expect(trace.transitions()).toEqual([{ tick: 2, level: 1 }, { tick: 3, level: 0 }]);
    expect(trace.toSegments(5)).toEqual([{ level: 1, ticks: 1 }, { level: 0, ticks: 2 }]);
  });

  it('yields segments that decode back to the recorded bytes', () => {
    const levels = SerialBits.toLevels(SerialBits.buildBits([0x5A, 0x0F], 4));
    const trace = new LineTrace();
    levels.forEach((level, tick) => trace.record(tick, level));
    expect(SerialBits.decodeBits(trace.toSegments(levels.length), 4)).toEqual([0x5A, 0x0F]);
  });

  it('forgets everything on reset', () => {
    const trace = new LineTrace();
    trace.record(3, 0);
    trace.reset();
    expect(trace.length).toBe(0);
    expect(trace.level).toBe(1);
    expect(trace.toSegments(4)).toEqual([{ level: 1, ticks: 4 }]);
  });

  it('rejects a zero capacity', () => {
    expect(() => new LineTrace(0)).toThrow(RangeError);
  });
});
