/**
 * Binary <-> Gray code conversion for values that cross clock domains.
 * Adjacent integers differ in exactly one bit of their Gray encoding.
 */
import type { Bit } from './types';

export function widthMask(width: number): number {
  if (!Number.isInteger(width) || width < 1 || width > 32) {
    throw new RangeError(`Invalid bit width: ${width}`);
  }
  return width === 32 ? 0xFFFFFFFF : (1 << width) - 1;
}

export function toGray(value: number): number {
  return (value ^ (value >>> 1)) >>> 0;
}

/**
 * Decode a Gray word: the top bit is copied, every lower bit is the XOR of
 * the decoded bit above it and its own Gray bit.
 */
export function fromGray(gray: number, width: number): number {
  const g = (gray & widthMask(width)) >>> 0;
  let bit = (g >>> (width - 1)) & 1;
  let value = bit << (width - 1);
  for (let i = width - 2; i >= 0; i--) {
    bit ^= (g >>> i) & 1;
    value |= bit << i;
  }
  return value >>> 0;
}

export function bitAt(value: number, index: number): Bit {
  return ((value >>> index) & 1) === 1 ? 1 : 0;
}
