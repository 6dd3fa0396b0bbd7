// src/core/types/flows/messages.ts
import type { Address, Bytes32, Hex } from '../primitives';
import { isAddressEq } from '../../utils/addr';
import { hexEq } from '../../utils/hash';

/** Wire discriminant carried as the first AppEvent param. */
export const MessageTag = {
  SendNative: 0,
  SendToken: 1,
} as const;

export type MessageKind = keyof typeof MessageTag;

/** Native-currency transfer. */
export interface SendNativeMessage {
  kind: 'SendNative';
  sender: Address;
  /** Destination account id, opaque here but always 32 bytes */
  recipient: Bytes32;
  amount: bigint;
  /** Low 64 bits of the wire nonce */
  nonce: bigint;
}

/** Token transfer, same fields plus the token contract. */
export interface SendTokenMessage {
  kind: 'SendToken';
  sender: Address;
  recipient: Bytes32;
  token: Address;
  amount: bigint;
  nonce: bigint;
}

export type Message = SendNativeMessage | SendTokenMessage;

/** Decoded inner payload. Internal to one decode call. */
export interface MessagePayload {
  sender: Address;
  recipient: Bytes32;
  token: Address;
  amount: bigint;
  nonce: bigint;
}

/** Outcome of the outer event decode. */
export interface MessageFrame {
  tag: number;
  payload: Hex;
}

/**
 * How wide wire integers are reduced to their declared width.
 * - 'truncate': keep the low-order bits
 * - 'strict': reject values that do not fit
 */
export type NarrowingMode = 'truncate' | 'strict';

export interface DecoderOptions {
  /** Defaults to 'truncate' */
  narrowing?: NarrowingMode;
}

/** Structural equality: same variant and same field values. */
export function isMessageEq(a: Message, b: Message): boolean {
  if (
    a.kind !== b.kind ||
    !isAddressEq(a.sender, b.sender) ||
    !hexEq(a.recipient, b.recipient) ||
    a.amount !== b.amount ||
    a.nonce !== b.nonce
  ) {
    return false;
  }
  if (a.kind === 'SendToken' && b.kind === 'SendToken') return isAddressEq(a.token, b.token);
  return true;
}
