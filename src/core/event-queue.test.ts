import { describe, it, expect } from 'vitest';
import {
  createEventQueue, enqueue, dequeue, peekTime, isEmpty, clearQueue,
  EVT_TICK, EVT_CALLBACK, EPSILON,
} from './event-queue';
import type { QueuedEvent } from './event-queue';

function drain(q: ReturnType<typeof createEventQueue>): QueuedEvent[] {
  const out: QueuedEvent[] = [];
  const evt: QueuedEvent = { time: 0, type: 0, payload: 0 };
  while (dequeue(q, evt)) out.push({ ...evt });
  return out;
}

describe('event queue', () => {
  it('dequeues in time order', () => {
    const q = createEventQueue();
    enqueue(q, 30, EVT_TICK, 3);
    enqueue(q, 10, EVT_TICK, 1);
    enqueue(q, 20, EVT_CALLBACK, 2);
    expect(peekTime(q)).toBe(10);
    expect(drain(q).map(e => e.payload)).toEqual([1, 2, 3]);
    expect(isEmpty(q)).toBe(true);
    expect(peekTime(q)).toBe(Infinity);
  });

  it('keeps equal times in arrival order by nudging the later one', () => {
    const q = createEventQueue();
    expect(enqueue(q, 10, EVT_TICK, 1)).toBe(10);
    expect(enqueue(q, 10, EVT_TICK, 2)).toBe(10 + EPSILON);
    enqueue(q, 5, EVT_TICK, 0);
    const events = drain(q);
    expect(events.map(e => e.payload)).toEqual([0, 1, 2]);
    expect(events[2].time).toBe(10 + EPSILON);
  });

  it('tracks its size and clears', () => {
    const q = createEventQueue();
    enqueue(q, 1, EVT_TICK, 0);
    enqueue(q, 2, EVT_TICK, 0);
    expect(q.size).toBe(2);
    clearQueue(q);
    expect(q.size).toBe(0);
    expect(isEmpty(q)).toBe(true);
  });

  it('holds 1024 events and throws on the next one', () => {
    const q = createEventQueue();
    for (let i = 0; i < 1024; i++) enqueue(q, i, EVT_TICK, 0);
    expect(() => enqueue(q, 2000, EVT_TICK, 0)).toThrow(/overflow/);
  });

  it('rejects a non-finite time', () => {
    const q = createEventQueue();
    expect(() => enqueue(q, Number.NaN, EVT_TICK, 0)).toThrow(RangeError);
  });
});
