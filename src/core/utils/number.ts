export const isNumber = (x: unknown): x is number => typeof x === 'number' && Number.isFinite(x);

export const isBigint = (x: unknown): x is bigint => typeof x === 'bigint';

// Keeps the low-order `bits` of an unsigned integer (two's-complement wrap, no range check).
export const lowBits = (x: bigint, bits: number): bigint => BigInt.asUintN(bits, x);

// True when x is non-negative and representable in `bits` bits.
export const fitsBits = (x: bigint, bits: number): boolean => x >= 0n && x < 1n << BigInt(bits);
