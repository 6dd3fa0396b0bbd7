import { describe, it, expect } from 'vitest';
import { assembleMessage } from '../assemble';
import { isBridgeError } from '../../../types/errors';
import type { MessagePayload } from '../../../types/flows/messages';
import { RECIPIENT, SENDER, TOKEN } from './mock-codec';

const payload: MessagePayload = {
  sender: SENDER,
  recipient: RECIPIENT,
  token: TOKEN,
  amount: 10n,
  nonce: 7n,
};

describe('messages/assemble.assembleMessage', () => {
  it('builds SendNative for tag 0 and drops the token', () => {
    const message = assembleMessage(0, payload);
    expect(message).toEqual({
      kind: 'SendNative',
      sender: SENDER,
      recipient: RECIPIENT,
      amount: 10n,
      nonce: 7n,
    });
    expect('token' in message).toBe(false);
  });

  it('builds SendToken for tag 1', () => {
    expect(assembleMessage(1, payload)).toEqual({
      kind: 'SendToken',
      sender: SENDER,
      recipient: RECIPIENT,
      token: TOKEN,
      amount: 10n,
      nonce: 7n,
    });
  });

  it('returns frozen values', () => {
    expect(Object.isFrozen(assembleMessage(1, payload))).toBe(true);
  });

  it.each([2, 3, 127, 255])('rejects tag %i with INVALID_TAG', (tag) => {
    let caught: unknown;
    try {
      assembleMessage(tag, payload);
    } catch (e) {
      caught = e;
    }
    expect(isBridgeError(caught)).toBe(true);
    if (!isBridgeError(caught)) return;
    expect(caught.envelope.type).toBe('INVALID_TAG');
    expect(caught.envelope.context).toEqual({ tag });
  });
});
