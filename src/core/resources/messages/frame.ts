// src/core/resources/messages/frame.ts
import { APP_EVENT_TOPIC_COUNT, TAG_BITS, TOPIC_APP_EVENT } from '../../constants';
import { createError } from '../../errors/factory';
import { createErrorHandlers } from '../../errors/error-ops';
import { OP_MESSAGES } from '../../types/errors';
import type { MessageFrame, NarrowingMode } from '../../types/flows/messages';
import type { EventLog } from '../../types/transactions';
import { hexEq } from '../../utils/hash';
import { fitsBits, lowBits } from '../../utils/number';
import type { AppEventCodec } from './types';

const { wrapAs } = createErrorHandlers('frame');

function assertTopics(log: EventLog): void {
  const topics = log.topics;
  if (topics.length !== APP_EVENT_TOPIC_COUNT) {
    throw createError('INVALID_DATA', {
      resource: 'frame',
      operation: OP_MESSAGES.frame.topics,
      message: `AppEvent log must carry exactly ${APP_EVENT_TOPIC_COUNT} topic.`,
      context: { expected: APP_EVENT_TOPIC_COUNT, actual: topics.length },
    });
  }
  const [topic0] = topics;
  if (!topic0 || !hexEq(topic0, TOPIC_APP_EVENT)) {
    throw createError('INVALID_DATA', {
      resource: 'frame',
      operation: OP_MESSAGES.frame.topics,
      message: 'Log topic does not match the AppEvent signature.',
      context: { expected: TOPIC_APP_EVENT, actual: topic0 },
    });
  }
}

/**
 * Decodes the outer AppEvent frame: (uint256 tag, bytes payload).
 *
 * The tag is reduced to one byte here; whether that byte names a known
 * message kind is checked by the assembler.
 */
export function decodeFrame(
  log: EventLog,
  codec: AppEventCodec,
  narrowing: NarrowingMode = 'truncate',
): MessageFrame {
  assertTopics(log);

  const tokens = wrapAs('INVALID_DATA', OP_MESSAGES.frame.decode, () => codec.decodeEvent(log), {
    message: 'Log data does not match the AppEvent ABI.',
  });

  const [tagToken, payloadToken] = tokens;
  if (!tagToken || tagToken.kind !== 'uint') {
    throw createError('INVALID_PAYLOAD', {
      resource: 'frame',
      operation: OP_MESSAGES.frame.tag,
      message: 'Expected an unsigned integer tag as the first event param.',
      context: { index: 0, expected: 'uint', actual: tagToken?.kind ?? 'missing' },
    });
  }
  if (!payloadToken || payloadToken.kind !== 'bytes') {
    throw createError('INVALID_PAYLOAD', {
      resource: 'frame',
      operation: OP_MESSAGES.frame.payload,
      message: 'Expected a byte sequence as the second event param.',
      context: { index: 1, expected: 'bytes', actual: payloadToken?.kind ?? 'missing' },
    });
  }

  if (narrowing === 'strict' && !fitsBits(tagToken.value, TAG_BITS)) {
    throw createError('INVALID_TAG', {
      resource: 'frame',
      operation: OP_MESSAGES.frame.tag,
      message: `Tag does not fit in ${TAG_BITS} bits.`,
      context: { tag: tagToken.value },
    });
  }

  return {
    tag: Number(lowBits(tagToken.value, TAG_BITS)),
    payload: payloadToken.value,
  };
}
