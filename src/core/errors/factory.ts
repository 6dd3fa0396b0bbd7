// src/core/errors/factory.ts
import { BridgeError, type ErrorEnvelope, type ErrorType } from '../types/errors';

/** Creates a BridgeError of the specified type, with the provided details. */
export function createError(type: ErrorType, input: Omit<ErrorEnvelope, 'type'>): BridgeError {
  return new BridgeError({ ...input, type });
}

/** Extracts and shapes the cause of an error into a standardized format. */
export function shapeCause(err: unknown) {
  const isRecord = (x: unknown): x is Record<string, unknown> =>
    x !== null && typeof x === 'object';

  const r = isRecord(err) ? err : undefined;

  const name = r && typeof r.name === 'string' ? r.name : undefined;
  // viem keeps the one-line summary in shortMessage; ethers in shortMessage too
  const message =
    r && typeof r.shortMessage === 'string'
      ? r.shortMessage
      : r && typeof r.message === 'string'
        ? r.message
        : typeof err === 'string'
          ? err
          : undefined;
  const code = r && 'code' in r ? r.code : undefined;

  return { name, message, code };
}
