// src/core/types/errors.ts

import { formatEnvelopePretty } from '../errors/formatter';

const hasSymbolInspect = typeof Symbol === 'function' && typeof Symbol.for === 'function';
const kInspect: symbol | undefined = hasSymbolInspect
  ? Symbol.for('nodejs.util.inspect.custom')
  : undefined;

/**
 * Decode failure kinds. All of them are terminal for the message being decoded.
 *
 * - INVALID_RLP: the raw log could not be rebuilt from its RLP encoding
 * - INVALID_DATA: topics/data do not satisfy the ABI grammar
 * - INVALID_TAG: discriminant outside the known message kinds
 * - INVALID_ADDRESS: an address field is not 20 bytes of hex
 * - INVALID_PAYLOAD: structural mismatch found by the decoder's own checks
 */
export type ErrorType =
  | 'INVALID_RLP'
  | 'INVALID_DATA'
  | 'INVALID_TAG'
  | 'INVALID_ADDRESS'
  | 'INVALID_PAYLOAD';

/** Decode stage that raised the error */
export type Resource = 'messages' | 'frame' | 'payload' | 'rlp' | 'receipts';

/** Envelope we throw for every decode failure. */
export interface ErrorEnvelope {
  /** Stage that raised the error. */
  resource: Resource;
  /** Operation, e.g. 'messages.payload:decode' */
  operation: string;
  /** Failure kind */
  type: ErrorType;
  /** Human-readable, stable message for developers. */
  message: string;

  /** Optional detail (field name, token index, raw tag, ...) */
  context?: Record<string, unknown>;

  /** Original thrown error, shaped */
  cause?: unknown;
}

/** Error class.
 * Every failure of the message decoder surfaces as a BridgeError wrapping an ErrorEnvelope.
 */
export class BridgeError extends Error {
  constructor(public readonly envelope: ErrorEnvelope) {
    super(formatEnvelopePretty(envelope), envelope.cause ? { cause: envelope.cause } : undefined);
    this.name = 'BridgeError';
  }

  get type(): ErrorType {
    return this.envelope.type;
  }

  toJSON() {
    return { name: this.name, ...this.envelope };
  }
}

if (kInspect) {
  Object.defineProperty(BridgeError.prototype, kInspect, {
    value(this: BridgeError) {
      return `${this.name}: ${formatEnvelopePretty(this.envelope)}`;
    },
    enumerable: false,
  });
}

//  ---- Type guards ----
export function isBridgeError(e: unknown): e is BridgeError {
  if (!e || typeof e !== 'object') return false;
  if (!('envelope' in e)) return false;

  const envelope: unknown = e.envelope;
  if (!envelope || typeof envelope !== 'object') return false;
  return (
    'type' in envelope &&
    typeof envelope.type === 'string' &&
    'message' in envelope &&
    typeof envelope.message === 'string'
  );
}

// TryResult type for operations that can fail without throwing
export type TryResult<T> = { ok: true; value: T } | { ok: false; error: BridgeError };

// Operation constants for message decoding error contexts
export const OP_MESSAGES = {
  decode: 'messages.decode',
  tryDecode: 'messages.tryDecode',
  tryDecodeRlp: 'messages.tryDecodeRlp',
  decodeReceipt: 'messages.decodeReceipt',
  frame: {
    topics: 'messages.frame:topics',
    decode: 'messages.frame:decode',
    tag: 'messages.frame:tag',
    payload: 'messages.frame:payload',
  },
  payload: {
    decode: 'messages.payload:decode',
    field: 'messages.payload:field',
    nonce: 'messages.payload:nonce',
  },
  assemble: 'messages.assemble',
  rlp: {
    decode: 'messages.rlp:decode',
    shape: 'messages.rlp:shape',
  },
  receipts: {
    find: 'messages.receipts:find',
  },
} as const;
