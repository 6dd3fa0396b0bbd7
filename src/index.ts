// index.ts

export * as constants from './core/constants';

export * as abi from './core/abi';

export * as errors from './core/errors/factory';
export { formatEnvelopePretty } from './core/errors/formatter';
export { BridgeError, isBridgeError, OP_MESSAGES } from './core/types/errors';

export * from './core/utils/addr';
export { MessageTag, isMessageEq } from './core/types/flows/messages';

// Core resources (decoder stages, receipt scanning)
export * from './core/resources/messages';

// Core types (type-only so we don't emit)
export type * from './core/types/errors';
export type * from './core/types/flows/messages';
export type * from './core/types/primitives';
export type * from './core/types/transactions';
