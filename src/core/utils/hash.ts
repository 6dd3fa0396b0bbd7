import type { Bytes32, Hex } from '../types/primitives';

const RegExpHex = /^0x[0-9a-fA-F]*$/;

export const isHex = (x: unknown): x is Hex => typeof x === 'string' && RegExpHex.test(x);

export const isHash = (x: unknown, length?: number): boolean => {
  if (!x || typeof x !== 'string') return false;
  return (length === undefined || x.length === length) && RegExpHex.test(x);
};

// Returns true if the string is a 0x-prefixed hex of length 66 (32 bytes + '0x')
export const isHash66 = (x: unknown): x is Bytes32 => isHash(x, 66);

// Byte length of a 0x-prefixed hex string (odd nibble counts round up)
export const hexByteLength = (x: Hex): number => Math.ceil((x.length - 2) / 2);

// Hex comparison for bytes32 values
export const hexEq = (a: Hex, b: Hex): boolean => a.toLowerCase() === b.toLowerCase();
