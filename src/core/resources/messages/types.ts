// src/core/resources/messages/types.ts
import type { Hex } from '../../types/primitives';
import type { EventLog } from '../../types/transactions';
import { assertNever } from '../../utils';

/** ABI parameter kinds the message schema is built from. */
export type AbiParam =
  | { kind: 'uint'; bits: 256 }
  | { kind: 'bytes' }
  | { kind: 'fixedBytes'; size: 32 }
  | { kind: 'address' };

/** Decoded ABI value tagged with the kind the codec produced. */
export type AbiToken =
  | { kind: 'uint'; value: bigint }
  | { kind: 'bytes'; value: Hex }
  | { kind: 'fixedBytes'; value: Hex }
  | { kind: 'address'; value: string }
  | { kind: 'unknown'; value: unknown };

// Codec interface for the ABI/RLP grammar the decoder stands on.
// Keeps the core resource adapter agnostic. Adapters (ethers, viem) provide
// the actual implementation. Implementations throw on grammar errors; the
// core maps those to INVALID_DATA / INVALID_RLP.
export interface AppEventCodec {
  /** Decodes a non-anonymous AppEvent log into its (uint256, bytes) tokens. */
  decodeEvent(log: EventLog): AbiToken[];
  /** Decodes a bare parameter list. */
  decodeParameters(params: readonly AbiParam[], data: Hex): AbiToken[];
  /** Rebuilds a log from its RLP encoding `[address, [topics...], data]`. */
  decodeLogRlp(bytes: Hex | Uint8Array): EventLog;
}

/** Solidity type string for a param. */
export function abiTypeOf(param: AbiParam): string {
  switch (param.kind) {
    case 'uint':
      return `uint${param.bits}`;
    case 'bytes':
      return 'bytes';
    case 'fixedBytes':
      return `bytes${param.size}`;
    case 'address':
      return 'address';
    default:
      return assertNever(param);
  }
}
