// Single wire level. 1 is mark (idle), 0 is space.
export type Bit = 0 | 1;

export const BYTE_MASK = 0xFF;

export const FramerPhase = {
  IDLE: 'idle',
  START: 'start',
  DATA: 'data',
  STOP: 'stop',
} as const;
export type FramerPhase = typeof FramerPhase[keyof typeof FramerPhase];

export const DeframerPhase = {
  IDLE: 'idle',
  START_BIT: 'start_bit',
  DATA_BITS: 'data_bits',
  STOP_BIT: 'stop_bit',
  WAIT_ACK: 'wait_ack',
} as const;
export type DeframerPhase = typeof DeframerPhase[keyof typeof DeframerPhase];

export const FetchState = {
  IDLE: 'idle',
  FETCHING: 'fetching',
  READY: 'ready',
} as const;
export type FetchState = typeof FetchState[keyof typeof FetchState];

/** Resolves a bit that was changing while a synchronizer stage sampled it. */
export type MetastabilityResolver = (previous: Bit, incoming: Bit) => Bit;

export interface FramerSnapshot {
  phase: FramerPhase;
  bitIndex: number;
  shift: number;
  serial: Bit;
}

export interface DeframerSnapshot {
  phase: DeframerPhase;
  bitIndex: number;
  sampleCount: number;
  shift: number;
  data: number;
  valid: boolean;
  frameError: boolean;
  falseStarts: number;
}

export interface PrefetchSnapshot<T> {
  state: FetchState;
  valid: boolean;
  value: T;
  reads: number;
}

export interface BufferSnapshot<T> {
  capacity: number;
  writeIndex: number;
  readIndex: number;
  level: number;
  empty: boolean;
  full: boolean;
  readData: T;
}

/** One register access as seen by the core on a single control tick. */
export interface RegisterAccess {
  address: number;       // register index (byte address >> 2)
  readEnable: boolean;
  writeEnable: boolean;
  writeData: number;
}

export interface RegisterResponse {
  readData: number;
  error: boolean;
}

export interface StatusFlags {
  txEmpty: boolean;
  txFull: boolean;
  rxEmpty: boolean;
  rxFull: boolean;
  txActive: boolean;
  rxActive: boolean;
  frameError: boolean;
  overrunError: boolean;
  txLevel: number;
  rxLevel: number;
}

export interface UartSnapshot {
  controlTicks: number;
  wireTicks: number;
  ctrl: number;
  baudDivisor: number;
  intEnable: number;
  intStatus: number;
  irq: boolean;
  status: StatusFlags;
  txLine: Bit;
  rxLine: Bit;
  framer: FramerSnapshot;
  deframer: DeframerSnapshot;
  rxPrefetch: PrefetchSnapshot<number>;
  txPrefetch: PrefetchSnapshot<number>;
}
