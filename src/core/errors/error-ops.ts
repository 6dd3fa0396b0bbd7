// src/core/errors/error-ops.ts

import { createError, shapeCause } from './factory';
import {
  isBridgeError,
  type TryResult,
  type ErrorEnvelope,
  type ErrorType,
  type Resource,
  type BridgeError,
} from '../types/errors';

type Ctx = Record<string, unknown>;

type WrapOptions<TCtx extends Ctx = Ctx> = {
  /** Optional contextual data for debugging */
  ctx?: TCtx;
  /** Optional error message */
  message?: string | (() => string);
};

function resolveMessage(op: string, msg?: string | (() => string)) {
  if (!msg) return `Error during ${op}.`;
  return typeof msg === 'function' ? msg() : msg;
}

// Wraps an unknown error into a BridgeError of the given type, preserving context.
export function toBridgeError(
  type: ErrorType,
  base: Omit<ErrorEnvelope, 'type' | 'cause'>,
  err: unknown,
): BridgeError {
  if (isBridgeError(err)) return err;
  return createError(type, { ...base, cause: shapeCause(err) });
}

/**
 * Factory for stage-scoped error handlers.
 * Decoding is synchronous, so unlike network-bound resources these never return promises.
 * Example:
 *   const { wrapAs, toResult } = createErrorHandlers('payload');
 */
export function createErrorHandlers(resource: Resource) {
  function wrapAs<T, TCtx extends Ctx = Ctx>(
    kind: ErrorType,
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): T {
    try {
      return fn();
    } catch (e) {
      // If already shaped, preserve it; else wrap with chosen kind.
      if (isBridgeError(e)) throw e;
      const message = resolveMessage(operation, opts?.message);
      throw toBridgeError(kind, { resource, operation, context: opts?.ctx ?? {}, message }, e);
    }
  }

  function toResult<T, TCtx extends Ctx = Ctx>(
    operation: string,
    fn: () => T,
    opts?: WrapOptions<TCtx>,
  ): TryResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (e) {
      // Anything unshaped at this point escaped the stage checks: report it as a payload fault
      const shaped = toBridgeError(
        'INVALID_PAYLOAD',
        {
          resource,
          operation,
          context: opts?.ctx ?? {},
          message: resolveMessage(operation, opts?.message),
        },
        e,
      );
      return { ok: false, error: shaped };
    }
  }

  return { wrapAs, toResult };
}
