// core/constants.ts

import type { Hex } from './types/primitives';

import { keccak_256 } from '@noble/hashes/sha3';
import { utf8ToBytes, bytesToHex } from '@noble/hashes/utils';

/** Keccak-256 of a string, returned as lowercase 0x-prefixed hex. */
export const k256hex = (s: string): Hex =>
  `0x${bytesToHex(keccak_256(utf8ToBytes(s)))}`.toLowerCase() as Hex;

// -----------------------------------------------------------------------------
// Event schema (must change in lockstep with the emitting contract)
// -----------------------------------------------------------------------------

/** Canonical signature of the bridge event. */
export const APP_EVENT_SIGNATURE = 'AppEvent(uint256,bytes)';

/** topic0 of AppEvent. */
export const TOPIC_APP_EVENT: Hex = k256hex(APP_EVENT_SIGNATURE);

/** Both event params are non-indexed, so only the signature topic is present. */
export const APP_EVENT_TOPIC_COUNT = 1;

// -----------------------------------------------------------------------------
// Widths
// -----------------------------------------------------------------------------

/** Tag is carried as uint256 on the wire and narrowed to one byte. */
export const TAG_BITS = 8;

/** Nonce is carried as uint256 on the wire and narrowed to 64 bits. */
export const NONCE_BITS = 64;

/** Recipient identifier width in bytes. */
export const RECIPIENT_BYTES = 32;
