/**
 * Dual-clock FIFO: each side sees the other's index only after it crosses a
 * Gray synchronizer.
 */
import { describe, it, expect } from 'vitest';
import { CrossDomainBuffer } from './cross-domain-buffer';
import { createMetastabilityState, metastabilityResolver } from './metastability';

// ============================================================================
// Test helpers
// ============================================================================

/** Run the read side until a value pops out or `limit` ticks pass. */
function readOne(buffer: CrossDomainBuffer<number>, limit = 10): number | undefined {
  for (let i = 0; i < limit; i++) {
    if (buffer.tickRead({ read: true })) return buffer.readData;
  }
  return undefined;
}

/**
 * Move `count` values through the buffer. The pattern decides which domain
 * ticks on each step.
 */
function transfer(
  buffer: CrossDomainBuffer<number>,
  count: number,
  writeTicks: (step: number) => boolean,
  readTicks: (step: number) => boolean,
): number[] {
  const received: number[] = [];
  let next = 0;
  for (let step = 0; step < 5000 && received.length < count; step++) {
    if (writeTicks(step)) {
      const value = next < count ? next : undefined;
      if (buffer.tickWrite(value) && value !== undefined) next++;
      expect(buffer.writeLevel()).toBeLessThanOrEqual(buffer.capacity);
    }
    if (readTicks(step)) {
      if (buffer.tickRead({ read: true })) received.push(buffer.readData);
      expect(buffer.readLevel()).toBeLessThanOrEqual(buffer.capacity);
    }
  }
  return received;
}

const sequence = (n: number) => Array.from({ length: n }, (_, i) => i);

// ============================================================================
// Tests
// ============================================================================

describe('CrossDomainBuffer', () => {
  it('uses log2(C) + 1 index bits', () => {
    expect(new CrossDomainBuffer(8, 0).indexWidth).toBe(4);
    expect(() => new CrossDomainBuffer(3, 0)).toThrow(RangeError);
  });

  it('makes a write visible to the reader after `stages` read ticks', () => {
    const buffer = new CrossDomainBuffer(4, 0, { stages: 2 });
    expect(buffer.tickWrite(0x5A)).toBe(true);
    expect(buffer.isEmptyAtRead()).toBe(true);

    expect(buffer.tickRead({ read: true })).toBe(false);
    expect(buffer.isEmptyAtRead()).toBe(true);
    expect(buffer.tickRead({ read: true })).toBe(false);
    expect(buffer.isEmptyAtRead()).toBe(false);
    expect(buffer.syncedWriteIndex).toBe(1);

    expect(buffer.tickRead({ read: true })).toBe(true);
    expect(buffer.readData).toBe(0x5A);
  });

  it('drops writes while the writer sees it full, until the freed slot syncs back', () => {
    const buffer = new CrossDomainBuffer(4, 0, { stages: 2 });
    for (let v = 1; v <= 4; v++) expect(buffer.tickWrite(v)).toBe(true);
    expect(buffer.isFullAtWrite()).toBe(true);
    expect(buffer.tickWrite(99)).toBe(false);

    expect(readOne(buffer)).toBe(1);
    expect(buffer.isFullAtWrite()).toBe(true);
    buffer.tickWrite();
    expect(buffer.isFullAtWrite()).toBe(true);
    buffer.tickWrite();
    expect(buffer.isFullAtWrite()).toBe(false);
    expect(buffer.writeLevel()).toBe(3);

    expect(buffer.tickWrite(5)).toBe(true);
    expect([readOne(buffer), readOne(buffer), readOne(buffer), readOne(buffer)]).toEqual([2, 3, 4, 5]);
  });

  it('delivers everything in order when the writer is faster', () => {
    const buffer = new CrossDomainBuffer(4, -1);
    const received = transfer(buffer, 40, () => true, step => step % 3 === 0);
    expect(received).toEqual(sequence(40));
  });

  it('delivers everything in order when the reader is faster', () => {
    const buffer = new CrossDomainBuffer(8, -1, { stages: 3 });
    const received = transfer(buffer, 40, step => step % 4 === 0, () => true);
    expect(received).toEqual(sequence(40));
  });

  it('delivers everything in order under the metastability model', () => {
    const state = createMetastabilityState(0.5, 2024);
    const buffer = new CrossDomainBuffer(4, -1, { resolver: metastabilityResolver(state) });
    const received = transfer(buffer, 60, step => step % 2 === 0, step => step % 3 !== 1);
    expect(received).toEqual(sequence(60));
    expect(state.held).toBeGreaterThan(0);
  });

  it('flushes by walking the read index up to the synced write index', () => {
    const buffer = new CrossDomainBuffer(4, 0, { stages: 2 });
    buffer.tickWrite(1);
    buffer.tickWrite(2);
    buffer.tickWrite(3);
    buffer.tickRead({ read: false });
    buffer.tickRead({ read: false });
    expect(buffer.readLevel()).toBe(3);

    buffer.tickRead({ read: false, flush: true });
    expect(buffer.draining).toBe(true);
    expect(buffer.readIndex).toBe(1);

    expect(buffer.tickRead({ read: true })).toBe(false);
    expect(buffer.readIndex).toBe(2);
    buffer.tickRead({ read: false });
    expect(buffer.readIndex).toBe(3);
    expect(buffer.draining).toBe(false);
    expect(buffer.isEmptyAtRead()).toBe(true);
    expect(buffer.readData).toBe(0);
  });

  it('finishes a flush at once when already empty', () => {
    const buffer = new CrossDomainBuffer(4, 0);
    buffer.tickRead({ read: false, flush: true });
    expect(buffer.draining).toBe(false);
    expect(buffer.readIndex).toBe(0);
  });

  it('resets both sides', () => {
    const buffer = new CrossDomainBuffer(4, 0);
    buffer.tickWrite(1);
    buffer.tickRead({ read: false });
    buffer.tickRead({ read: false });
    buffer.reset();
    expect(buffer.writeIndex).toBe(0);
    expect(buffer.readIndex).toBe(0);
    expect(buffer.isEmptyAtRead()).toBe(true);
    expect(buffer.isEmptyAtWrite()).toBe(true);
  });
});
