/**
 * Sorted event queue backed by a pool-allocated linked list.
 *
 * Fixed pool of 1024 nodes. Events are sorted by time (ascending).
 * O(1) dequeue from head, O(n) insertion scan but no array shifting.
 * Events at equal times keep their enqueue order: the later arrival is
 * nudged forward by EPSILON.
 */

/** A clock domain tick. Payload: domain index. */
export const EVT_TICK = 0;
/** A one-shot callback. Payload: callback id. */
export const EVT_CALLBACK = 1;

export const EPSILON = 0.001; // ns nudge for collision resolution
export const POOL_SIZE = 1024;
const NIL = -1;

export interface EventQueue {
  // Pool storage, parallel arrays indexed by pool slot
  times: Float64Array;
  types: Uint8Array;
  payloads: Uint16Array;
  next: Int16Array;     // next pointer (-1 = end)

  head: number;         // index of first (soonest) event, or NIL
  freeHead: number;     // head of free list, or NIL
  size: number;
}

export interface QueuedEvent {
  time: number;
  type: number;
  payload: number;
}

function buildFreeList(next: Int16Array): void {
  for (let i = 0; i < POOL_SIZE - 1; i++) next[i] = i + 1;
  next[POOL_SIZE - 1] = NIL;
}

export function createEventQueue(): EventQueue {
  const next = new Int16Array(POOL_SIZE);
  buildFreeList(next);
  return {
    times: new Float64Array(POOL_SIZE),
    types: new Uint8Array(POOL_SIZE),
    payloads: new Uint16Array(POOL_SIZE),
    next,
    head: NIL,
    freeHead: 0,
    size: 0,
  };
}

function alloc(q: EventQueue): number {
  const idx = q.freeHead;
  if (idx === NIL) throw new Error(`EventQueue overflow (${POOL_SIZE} limit)`);
  q.freeHead = q.next[idx];
  q.size++;
  return idx;
}

function free(q: EventQueue, idx: number): void {
  q.next[idx] = q.freeHead;
  q.freeHead = idx;
  q.size--;
}

/**
 * Enqueue an event at `time`. Returns the time actually stored, which is
 * later than `time` only when it collided with queued events.
 */
export function enqueue(q: EventQueue, time: number, type: number, payload: number): number {
  if (!Number.isFinite(time)) throw new RangeError(`Event time must be finite: ${time}`);
  let t = time;
  const slot = alloc(q);
  q.types[slot] = type;
  q.payloads[slot] = payload;

  if (q.head === NIL || t < q.times[q.head]) {
    q.times[slot] = t;
    q.next[slot] = q.head;
    q.head = slot;
    return t;
  }

  // Walk past every node at or before t; a tie moves t behind it.
  let prev = NIL;
  let cur = q.head;
  while (cur !== NIL && q.times[cur] <= t) {
    if (q.times[cur] === t) t += EPSILON;
    prev = cur;
    cur = q.next[cur];
  }

  q.times[slot] = t;
  q.next[slot] = cur;
  q.next[prev] = slot;
  return t;
}

export function isEmpty(q: EventQueue): boolean {
  return q.head === NIL;
}

/** Head event time, or Infinity if empty. */
export function peekTime(q: EventQueue): number {
  return q.head === NIL ? Infinity : q.times[q.head];
}

/**
 * Dequeue the soonest event into `out`. Returns false if empty.
 */
export function dequeue(q: EventQueue, out: QueuedEvent): boolean {
  if (q.head === NIL) return false;
  const idx = q.head;
  out.time = q.times[idx];
  out.type = q.types[idx];
  out.payload = q.payloads[idx];
  q.head = q.next[idx];
  free(q, idx);
  return true;
}

export function clearQueue(q: EventQueue): void {
  buildFreeList(q.next);
  q.head = NIL;
  q.freeHead = 0;
  q.size = 0;
}
