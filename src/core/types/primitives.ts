// src/core/types/primitives.ts

export type Hex = `0x${string}`;
export type Address = `0x${string}`;

/** 0x-prefixed hex string holding exactly 32 bytes. */
export type Bytes32 = `0x${string}`;
