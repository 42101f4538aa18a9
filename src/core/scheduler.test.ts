import { describe, it, expect } from 'vitest';
import { ClockScheduler, SimulationTimeoutError } from './scheduler';

describe('ClockScheduler', () => {
  it('ticks each domain at its own period', () => {
    const scheduler = new ClockScheduler();
    const a = scheduler.addDomain('a', 10, () => {});
    const b = scheduler.addDomain('b', 25, () => {});
    scheduler.runFor(95);
    expect(scheduler.ticks(a)).toBe(10);
    expect(scheduler.ticks(b)).toBe(4);
    expect(scheduler.now).toBe(95);
  });

  it('interleaves domains by time', () => {
    const scheduler = new ClockScheduler();
    const log: string[] = [];
    scheduler.addDomain('a', 3, () => log.push(`a@${scheduler.now}`));
    scheduler.addDomain('b', 2, () => log.push(`b@${scheduler.now}`));
    scheduler.runFor(5);
    expect(log).toEqual(['a@0', 'b@0', 'b@2', 'a@3', 'b@4']);
  });

  it('honours a start phase', () => {
    const scheduler = new ClockScheduler();
    const times: number[] = [];
    scheduler.addDomain('late', 10, () => times.push(scheduler.now), 4);
    scheduler.runFor(30);
    expect(times).toEqual([4, 14, 24]);
  });

  it('runs one-shot callbacks at their time', () => {
    const scheduler = new ClockScheduler();
    const log: string[] = [];
    scheduler.addDomain('clk', 10, () => log.push(`tick@${scheduler.now}`));
    scheduler.schedule(15, () => log.push(`cb@${scheduler.now}`));
    scheduler.runFor(20);
    expect(log).toEqual(['tick@0', 'tick@10', 'cb@15', 'tick@20']);
  });

  it('runs a given number of ticks of one domain', () => {
    const scheduler = new ClockScheduler();
    const fast = scheduler.addDomain('fast', 1, () => {});
    const slow = scheduler.addDomain('slow', 7, () => {});
    scheduler.runTicks(slow, 3);
    expect(scheduler.ticks(slow)).toBe(3);
    expect(scheduler.now).toBe(14);
    expect(scheduler.ticks(fast)).toBeGreaterThanOrEqual(14);
  });

  it('returns the time a condition first holds', () => {
    const scheduler = new ClockScheduler();
    const clk = scheduler.addDomain('clk', 10, () => {});
    expect(scheduler.runUntil(() => scheduler.ticks(clk) >= 3, 1000)).toBe(20);
  });

  it('throws SimulationTimeoutError when the condition does not hold in time', () => {
    const scheduler = new ClockScheduler();
    scheduler.addDomain('clk', 10, () => {});
    let caught: unknown;
    try {
      scheduler.runUntil(() => false, 50);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SimulationTimeoutError);
    expect(caught instanceof SimulationTimeoutError && caught.limitNS).toBe(50);
    expect(scheduler.now).toBe(50);
  });

  it('changes a period from the next tick on', () => {
    const scheduler = new ClockScheduler();
    const times: number[] = [];
    const clk = scheduler.addDomain('clk', 10, () => times.push(scheduler.now));
    scheduler.runTicks(clk, 1);
    scheduler.setPeriod(clk, 5);
    scheduler.runFor(20);
    expect(times).toEqual([0, 10, 15, 20]);
    expect(scheduler.domain(clk)).toEqual({ name: 'clk', periodNS: 5, ticks: 4 });
  });

  it('rejects bad periods and unknown domains', () => {
    const scheduler = new ClockScheduler();
    expect(() => scheduler.addDomain('zero', 0, () => {})).toThrow(RangeError);
    expect(() => scheduler.addDomain('neg', 10, () => {}, -1)).toThrow(RangeError);
    expect(() => scheduler.ticks(3)).toThrow(RangeError);
    expect(() => scheduler.schedule(-1, () => {})).toThrow(RangeError);
  });

  it('refuses a callback once the event pool is full', () => {
    const scheduler = new ClockScheduler();
    scheduler.addDomain('clk', 10, () => {});
    for (let i = 0; i < 1023; i++) scheduler.schedule(i, () => {});
    expect(() => scheduler.schedule(5, () => {})).toThrow('Too many pending callbacks (1023)');
    scheduler.runFor(1100);
    expect(scheduler.idle).toBe(false);
    expect(() => scheduler.schedule(5, () => {})).not.toThrow();
  });

  it('clears everything', () => {
    const scheduler = new ClockScheduler();
    scheduler.addDomain('clk', 10, () => {});
    scheduler.runFor(30);
    scheduler.clear();
    expect(scheduler.now).toBe(0);
    expect(scheduler.idle).toBe(true);
    expect(scheduler.step()).toBe(false);
  });
});
