// src/core/resources/messages/schema.ts
import { isBigint } from '../../utils/number';
import { isHex } from '../../utils/hash';
import type { AbiParam, AbiToken } from './types';

/** AppEvent params: (uint256 tag, bytes payload), both non-indexed. */
export const APP_EVENT_PARAMS = [
  { kind: 'uint', bits: 256 },
  { kind: 'bytes' },
] as const satisfies readonly AbiParam[];

/**
 * Inner payload:
 * (address sender, bytes32 recipient, address token, uint256 amount, uint256 nonce).
 */
export const MESSAGE_PAYLOAD_PARAMS = [
  { kind: 'address' },
  { kind: 'fixedBytes', size: 32 },
  { kind: 'address' },
  { kind: 'uint', bits: 256 },
  { kind: 'uint', bits: 256 },
] as const satisfies readonly AbiParam[];

// Tags a value returned by an ABI library with the kind its JS shape actually has.
// Anything not matching the declared param becomes an 'unknown' token.
export function toToken(param: AbiParam, value: unknown): AbiToken {
  switch (param.kind) {
    case 'uint':
      return isBigint(value) ? { kind: 'uint', value } : { kind: 'unknown', value };
    case 'bytes':
      return isHex(value) ? { kind: 'bytes', value } : { kind: 'unknown', value };
    case 'fixedBytes':
      return isHex(value) ? { kind: 'fixedBytes', value } : { kind: 'unknown', value };
    case 'address':
      return typeof value === 'string' ? { kind: 'address', value } : { kind: 'unknown', value };
  }
}

export function toTokens(params: readonly AbiParam[], values: readonly unknown[]): AbiToken[] {
  return values.map((value, i) => {
    const param = params[i];
    return param ? toToken(param, value) : { kind: 'unknown', value };
  });
}
