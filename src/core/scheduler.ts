/**
 * Discrete-event driver for independent clock domains.
 *
 * Each registered domain ticks at a fixed period. Domains keep their nominal
 * tick times, so collisions in the queue never accumulate drift. Ticks that
 * land on the same instant run in the order they were queued.
 */
import {
  createEventQueue, enqueue, dequeue, peekTime, isEmpty, clearQueue,
  EVT_TICK, EVT_CALLBACK, POOL_SIZE,
} from './event-queue';
import type { EventQueue, QueuedEvent } from './event-queue';

export class SimulationTimeoutError extends Error {
  readonly limitNS: number;

  constructor(message: string, limitNS: number) {
    super(message);
    this.name = 'SimulationTimeoutError';
    this.limitNS = limitNS;
  }
}

export interface ClockDomainInfo {
  name: string;
  periodNS: number;
  ticks: number;
}

interface DomainEntry extends ClockDomainInfo {
  nextNS: number;
  onTick: () => void;
}

interface PendingCallback {
  timeNS: number;
  run: () => void;
}

export class ClockScheduler {
  private readonly queue: EventQueue = createEventQueue();
  private readonly domains: DomainEntry[] = [];
  private readonly callbacks = new Map<number, PendingCallback>();
  private nextCallbackId = 0;
  private readonly event: QueuedEvent = { time: 0, type: 0, payload: 0 };
  private _now = 0;

  /** Current simulated time in ns. */
  get now(): number {
    return this._now;
  }

  /**
   * Register a clock domain. The first tick happens at `phaseNS` past the
   * current time. Returns the domain index.
   */
  addDomain(name: string, periodNS: number, onTick: () => void, phaseNS: number = 0): number {
    if (!(periodNS > 0) || !Number.isFinite(periodNS)) {
      throw new RangeError(`Clock domain '${name}' needs a positive period, got ${periodNS}`);
    }
    if (phaseNS < 0) throw new RangeError(`Clock domain '${name}' phase must not be negative`);
    const index = this.domains.length;
    const entry: DomainEntry = { name, periodNS, ticks: 0, nextNS: this._now + phaseNS, onTick };
    this.domains.push(entry);
    enqueue(this.queue, entry.nextNS, EVT_TICK, index);
    return index;
  }

  /** Change a domain's period. The tick already queued keeps its time. */
  setPeriod(domain: number, periodNS: number): void {
    if (!(periodNS > 0) || !Number.isFinite(periodNS)) {
      throw new RangeError(`Clock period must be positive, got ${periodNS}`);
    }
    this.entry(domain).periodNS = periodNS;
  }

  domain(index: number): ClockDomainInfo {
    const { name, periodNS, ticks } = this.entry(index);
    return { name, periodNS, ticks };
  }

  ticks(domain: number): number {
    return this.entry(domain).ticks;
  }

  /** Run `fn` once, `delayNS` from now. */
  schedule(delayNS: number, fn: () => void): void {
    if (delayNS < 0) throw new RangeError('Cannot schedule into the past');
    // Callbacks share the event pool with the domains' pending ticks.
    if (this.queue.size >= POOL_SIZE) throw new Error(`Too many pending callbacks (${this.callbacks.size})`);
    let id = this.nextCallbackId;
    while (this.callbacks.has(id)) id = (id + 1) % POOL_SIZE;
    this.nextCallbackId = (id + 1) % POOL_SIZE;
    const timeNS = this._now + delayNS;
    this.callbacks.set(id, { timeNS, run: fn });
    enqueue(this.queue, timeNS, EVT_CALLBACK, id);
  }

  /** Process the soonest event. Returns false if nothing is queued. */
  step(): boolean {
    if (!dequeue(this.queue, this.event)) return false;
    const { type, payload } = this.event;

    if (type === EVT_TICK) {
      const entry = this.entry(payload);
      this._now = entry.nextNS;
      entry.nextNS += entry.periodNS;
      enqueue(this.queue, entry.nextNS, EVT_TICK, payload);
      entry.ticks++;
      entry.onTick();
      return true;
    }

    const callback = this.callbacks.get(payload);
    if (callback === undefined) throw new Error(`Unknown callback id ${payload}`);
    this.callbacks.delete(payload);
    this._now = callback.timeNS;
    callback.run();
    return true;
  }

  /** Advance simulated time by `durationNS`, running every event up to it. */
  runFor(durationNS: number): void {
    const end = this._now + durationNS;
    while (peekTime(this.queue) <= end) this.step();
    this._now = end;
  }

  /** Run until `domain` has ticked `count` more times. */
  runTicks(domain: number, count: number): void {
    const entry = this.entry(domain);
    const target = entry.ticks + count;
    while (entry.ticks < target) {
      if (!this.step()) throw new Error('Scheduler ran out of events');
    }
  }

  /**
   * Step until `predicate` holds. Throws SimulationTimeoutError if it does
   * not within `limitNS`. Returns the time at which it held.
   */
  runUntil(predicate: () => boolean, limitNS: number): number {
    const deadline = this._now + limitNS;
    while (!predicate()) {
      if (peekTime(this.queue) > deadline) {
        throw new SimulationTimeoutError(
          `Condition not met within ${limitNS} ns (at ${this._now.toFixed(1)} ns)`,
          limitNS,
        );
      }
      if (!this.step()) throw new Error('Scheduler ran out of events');
    }
    return this._now;
  }

  get idle(): boolean {
    return isEmpty(this.queue);
  }

  /** Drop every domain and callback and rewind time to 0. */
  clear(): void {
    clearQueue(this.queue);
    this.domains.length = 0;
    this.callbacks.clear();
    this.nextCallbackId = 0;
    this._now = 0;
  }

  private entry(index: number): DomainEntry {
    const entry = this.domains[index];
    if (entry === undefined) throw new RangeError(`Unknown clock domain ${index}`);
    return entry;
  }
}
