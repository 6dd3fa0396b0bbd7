// src/core/resources/messages/events.ts
import { TOPIC_APP_EVENT } from '../../constants';
import { createError } from '../../errors/factory';
import { OP_MESSAGES } from '../../types/errors';
import type { Address } from '../../types/primitives';
import type { EventLog, TxReceipt } from '../../types/transactions';

export type FindAppEventOptions = {
  /** Only accept logs emitted by this contract */
  emitter?: Address;
};

function isAppEventLog(log: EventLog, emitter?: string): boolean {
  const t0 = (log.topics[0] ?? '').toLowerCase();
  if (t0 !== TOPIC_APP_EVENT) return false;
  return !emitter || (log.address ?? '').toLowerCase() === emitter;
}

// Returns every AppEvent log in the receipt, in log order.
export function findAppEventLogs(receipt: TxReceipt, opts?: FindAppEventOptions): EventLog[] {
  const emitter = opts?.emitter?.toLowerCase();
  return receipt.logs.filter((lg) => isAppEventLog(lg, emitter));
}

// Finds one AppEvent log; `index` picks among several matches (defaults to the first).
export function findAppEventLog(
  receipt: TxReceipt,
  opts?: FindAppEventOptions & { index?: number },
): EventLog {
  const index = opts?.index ?? 0;
  const matches = findAppEventLogs(receipt, opts);
  const chosen = matches[index];
  if (!chosen) {
    throw createError('INVALID_DATA', {
      resource: 'receipts',
      operation: OP_MESSAGES.receipts.find,
      message: matches.length
        ? `Only ${matches.length} AppEvent log(s) in receipt; index ${index} requested.`
        : 'No AppEvent log found in receipt.',
      context: { index, expected: index + 1, actual: matches.length },
    });
  }
  return chosen;
}
