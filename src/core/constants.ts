// Frame layout: 1 start + 8 data + 1 stop
export const DATA_BITS = 8;
export const BITS_PER_FRAME = 10;

/** Deframer sample ticks per bit period. */
export const OVERSAMPLE = 16;
/** Sample count at which a bit is read (bit centre). */
export const SAMPLE_POINT = 8;

export const DEFAULT_FIFO_DEPTH = 8;
export const DEFAULT_SYNC_STAGES = 2;
/** Pulse synchronizers use a third stage for edge detection. */
export const PULSE_SYNC_STAGES = 3;

/** Reset value of BAUD_DIV: 7.3728 MHz / (115200 * 16). */
export const DEFAULT_BAUD_DIVISOR = 4;
export const BAUD_DIVISOR_WIDTH = 16;
export const BAUD_DIVISOR_MASK = 0xFFFF;

/** Wire clock that gives the reset divisor 115200 baud. */
export const REFERENCE_WIRE_CLOCK_HZ = 7_372_800;

/** BAUD_DIV value for a wire clock and baud rate (16x oversampling). */
export function baudDivisor(baud: number, wireClockHz: number = REFERENCE_WIRE_CLOCK_HZ): number {
  if (baud <= 0) throw new RangeError(`Invalid baud rate: ${baud}`);
  const divisor = Math.floor(wireClockHz / (baud * OVERSAMPLE));
  if (divisor < 1 || divisor > BAUD_DIVISOR_MASK) {
    throw new RangeError(`Baud rate ${baud} is not reachable from ${wireClockHz} Hz`);
  }
  return divisor;
}

// ============================================================================
// Register map
// ============================================================================

/** Byte addresses as seen on the bus. */
export const REG_ADDR = {
  CTRL:       0x00,
  STATUS:     0x04,
  TX_DATA:    0x08,
  RX_DATA:    0x0C,
  BAUD_DIV:   0x10,
  INT_ENABLE: 0x14,
  INT_STATUS: 0x18,
  FIFO_CTRL:  0x1C,
} as const;
export type RegisterName = keyof typeof REG_ADDR;

/** Register indices used by the core (byte address >> 2). */
export const REG = {
  CTRL:       REG_ADDR.CTRL >> 2,
  STATUS:     REG_ADDR.STATUS >> 2,
  TX_DATA:    REG_ADDR.TX_DATA >> 2,
  RX_DATA:    REG_ADDR.RX_DATA >> 2,
  BAUD_DIV:   REG_ADDR.BAUD_DIV >> 2,
  INT_ENABLE: REG_ADDR.INT_ENABLE >> 2,
  INT_STATUS: REG_ADDR.INT_STATUS >> 2,
  FIFO_CTRL:  REG_ADDR.FIFO_CTRL >> 2,
} as const;

export const NUM_REGISTERS = 8;

export const CTRL = {
  TX_EN: 1 << 0,
  RX_EN: 1 << 1,
} as const;
export const CTRL_MASK = 0x03;

export const STATUS = {
  TX_EMPTY:      1 << 0,
  TX_FULL:       1 << 1,
  RX_EMPTY:      1 << 2,
  RX_FULL:       1 << 3,
  TX_ACTIVE:     1 << 4,
  RX_ACTIVE:     1 << 5,
  FRAME_ERROR:   1 << 6,
  OVERRUN_ERROR: 1 << 7,
} as const;
export const STATUS_TX_LEVEL_SHIFT = 8;
export const STATUS_RX_LEVEL_SHIFT = 16;

/** Bits shared by INT_ENABLE and INT_STATUS. */
export const INT = {
  TX_READY:  1 << 0,
  RX_READY:  1 << 1,
  FRAME_ERR: 1 << 2,
  OVERRUN:   1 << 3,
} as const;
export const INT_MASK = 0x0F;

export const FIFO_CTRL = {
  TX_FIFO_RST: 1 << 0,
  RX_FIFO_RST: 1 << 1,
} as const;
