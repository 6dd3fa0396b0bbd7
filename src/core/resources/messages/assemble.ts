// src/core/resources/messages/assemble.ts
import { createError } from '../../errors/factory';
import { OP_MESSAGES } from '../../types/errors';
import { MessageTag, type Message, type MessagePayload } from '../../types/flows/messages';

// Picks the message variant named by the tag. Pure; the tag is the only thing checked here.
export function assembleMessage(tag: number, payload: MessagePayload): Message {
  const { sender, recipient, token, amount, nonce } = payload;
  switch (tag) {
    case MessageTag.SendNative: {
      // token is decoded but has no meaning for native transfers
      const message: Message = { kind: 'SendNative', sender, recipient, amount, nonce };
      return Object.freeze(message);
    }
    case MessageTag.SendToken: {
      const message: Message = { kind: 'SendToken', sender, recipient, token, amount, nonce };
      return Object.freeze(message);
    }
    default:
      throw createError('INVALID_TAG', {
        resource: 'messages',
        operation: OP_MESSAGES.assemble,
        message:
          `Unknown message tag ${tag}; expected ${MessageTag.SendNative} (SendNative)` +
          ` or ${MessageTag.SendToken} (SendToken).`,
        context: { tag },
      });
  }
}
