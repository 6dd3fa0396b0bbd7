// src/core/resources/messages/rlp.ts
import { createError } from '../../errors/factory';
import { OP_MESSAGES } from '../../types/errors';
import type { Hex } from '../../types/primitives';
import type { EventLog } from '../../types/transactions';
import { isAddress } from '../../utils/addr';
import { isHash66, isHex } from '../../utils/hash';

function shapeError(message: string, context: Record<string, unknown> = {}) {
  return createError('INVALID_RLP', {
    resource: 'rlp',
    operation: OP_MESSAGES.rlp.shape,
    message,
    context,
  });
}

/**
 * Validates the structure an RLP decoder produced for an Ethereum log:
 * `[address(20), [topic(32), ...], data]`, every item as 0x-hex.
 */
export function logFromRlp(decoded: unknown): EventLog {
  if (!Array.isArray(decoded) || decoded.length !== 3) {
    throw shapeError('RLP log must be a list of exactly 3 items.', {
      expected: 3,
      actual: Array.isArray(decoded) ? decoded.length : typeof decoded,
    });
  }
  const [address, rawTopics, data]: unknown[] = decoded;

  if (!isAddress(address)) {
    throw shapeError('RLP log address must be 20 bytes.', { field: 'address' });
  }
  if (!Array.isArray(rawTopics)) {
    throw shapeError('RLP log topics must be a list.', { field: 'topics' });
  }

  const topics: Hex[] = [];
  for (const [index, topic] of rawTopics.entries()) {
    if (!isHash66(topic)) {
      throw shapeError('RLP log topic must be 32 bytes.', { field: 'topics', index });
    }
    topics.push(topic);
  }

  if (!isHex(data)) throw shapeError('RLP log data must be a byte string.', { field: 'data' });

  return { address, topics, data };
}
