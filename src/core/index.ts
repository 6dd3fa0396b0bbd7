// src/core/index.ts
export {
  APP_EVENT_SIGNATURE,
  TOPIC_APP_EVENT,
  TAG_BITS,
  NONCE_BITS,
  RECIPIENT_BYTES,
} from './constants';

export * as errors from './errors/factory';
export { formatEnvelopePretty } from './errors/formatter';
export { BridgeError, isBridgeError, OP_MESSAGES } from './types/errors';

export * from './utils/addr';
export { MessageTag, isMessageEq } from './types/flows/messages';

// Core resources (decoder stages, receipt scanning)
export * from './resources/messages';

// Core types (type-only)
export type * from './types/errors';
export type * from './types/flows/messages';
export type * from './types/primitives';
export type * from './types/transactions';
