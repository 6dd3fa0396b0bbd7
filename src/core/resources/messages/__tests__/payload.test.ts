import { describe, it, expect, vi } from 'vitest';
import { decodePayload } from '../payload';
import { MESSAGE_PAYLOAD_PARAMS } from '../schema';
import { isBridgeError, type BridgeError } from '../../../types/errors';
import type { AbiToken } from '../types';
import { RECIPIENT, SENDER, TOKEN, createMockCodec, payloadTokens } from './mock-codec';

const catchError = (fn: () => unknown): BridgeError => {
  try {
    fn();
  } catch (e) {
    if (isBridgeError(e)) return e;
    throw e;
  }
  throw new Error('expected a BridgeError');
};

const withTokens = (tokens: AbiToken[]) => createMockCodec({ decodeParameters: () => tokens });

const replaceAt = (index: number, token: AbiToken): AbiToken[] => {
  const tokens = payloadTokens();
  tokens[index] = token;
  return tokens;
};

describe('messages/payload.decodePayload', () => {
  it('decodes the five fields in order', () => {
    const decodeParameters = vi.fn(() => payloadTokens({ token: TOKEN, amount: 10n, nonce: 7n }));
    const payload = decodePayload('0xfeed', createMockCodec({ decodeParameters }));

    expect(payload).toEqual({
      sender: SENDER,
      recipient: RECIPIENT,
      token: TOKEN,
      amount: 10n,
      nonce: 7n,
    });
    expect(decodeParameters).toHaveBeenCalledWith(MESSAGE_PAYLOAD_PARAMS, '0xfeed');
  });

  it('truncates the nonce to its low 64 bits', () => {
    const codec = withTokens(payloadTokens({ nonce: (1n << 64n) + 7n }));
    expect(decodePayload('0x', codec).nonce).toBe(7n);
  });

  it('rejects a nonce wider than 64 bits in strict mode', () => {
    const codec = withTokens(payloadTokens({ nonce: 1n << 64n }));
    const err = catchError(() => decodePayload('0x', codec, 'strict'));
    expect(err.envelope.type).toBe('INVALID_PAYLOAD');
    expect(err.envelope.operation).toBe('messages.payload:nonce');
  });

  it('keeps the largest 64-bit nonce in strict mode', () => {
    const max = (1n << 64n) - 1n;
    const codec = withTokens(payloadTokens({ nonce: max }));
    expect(decodePayload('0x', codec, 'strict').nonce).toBe(max);
  });

  it('keeps the full 256-bit amount', () => {
    const amount = (1n << 256n) - 1n;
    expect(decodePayload('0x', withTokens(payloadTokens({ amount }))).amount).toBe(amount);
  });

  it('does not judge field meaning (zero sender is accepted)', () => {
    const tokens = replaceAt(0, { kind: 'address', value: `0x${'00'.repeat(20)}` });
    expect(decodePayload('0x', withTokens(tokens)).sender).toBe(`0x${'00'.repeat(20)}`);
  });

  it.each([31, 33])('rejects a %i-byte recipient', (size) => {
    const tokens = replaceAt(1, { kind: 'fixedBytes', value: `0x${'ab'.repeat(size)}` });
    const err = catchError(() => decodePayload('0x', withTokens(tokens)));
    expect(err.envelope.type).toBe('INVALID_PAYLOAD');
    expect(err.envelope.context).toEqual({
      field: 'recipient',
      index: 1,
      expected: 32,
      actual: size,
    });
  });

  it.each<{ index: number; field: string; expected: AbiToken['kind'] }>([
    { index: 0, field: 'sender', expected: 'address' },
    { index: 1, field: 'recipient', expected: 'fixedBytes' },
    { index: 2, field: 'token', expected: 'address' },
    { index: 3, field: 'amount', expected: 'uint' },
    { index: 4, field: 'nonce', expected: 'uint' },
  ])('rejects a wrong kind for $field', ({ index, field, expected }) => {
    const tokens = replaceAt(index, { kind: 'bytes', value: '0x01' });
    const err = catchError(() => decodePayload('0x', withTokens(tokens)));
    expect(err.envelope.type).toBe('INVALID_PAYLOAD');
    expect(err.envelope.context).toEqual({ field, index, expected, actual: 'bytes' });
  });

  it('rejects a missing trailing field', () => {
    const tokens = payloadTokens().slice(0, 4);
    const err = catchError(() => decodePayload('0x', withTokens(tokens)));
    expect(err.envelope.type).toBe('INVALID_PAYLOAD');
    expect(err.envelope.message).toBe("Payload field 'nonce' is missing.");
  });

  it('stops at the first bad field', () => {
    const tokens: AbiToken[] = [
      { kind: 'unknown', value: null },
      { kind: 'unknown', value: null },
    ];
    const err = catchError(() => decodePayload('0x', withTokens(tokens)));
    expect(err.envelope.context).toMatchObject({ field: 'sender', index: 0 });
  });

  it('reports malformed addresses as INVALID_ADDRESS', () => {
    const tokens = replaceAt(2, { kind: 'address', value: '0x1234' });
    const err = catchError(() => decodePayload('0x', withTokens(tokens)));
    expect(err.envelope.type).toBe('INVALID_ADDRESS');
    expect(err.envelope.context).toEqual({ field: 'token', index: 2, actual: '0x1234' });
  });

  it('maps grammar failures to INVALID_DATA', () => {
    const codec = createMockCodec({
      decodeParameters: () => {
        throw new RangeError('Position 160 is out of bounds');
      },
    });
    const err = catchError(() => decodePayload('0x12', codec));
    expect(err.envelope.type).toBe('INVALID_DATA');
    expect(err.envelope.resource).toBe('payload');
    expect(err.envelope.operation).toBe('messages.payload:decode');
  });

  it('rejects an address word with non-zero padding as INVALID_DATA', () => {
    const data: `0x${string}` = `0x${[
      '00'.repeat(12) + '11'.repeat(20),
      '22'.repeat(32),
      `ff${'00'.repeat(11)}${'33'.repeat(20)}`,
      '00'.repeat(32),
      '00'.repeat(32),
    ].join('')}`;
    // The codec keeps only the low 20 bytes of each address word.
    const err = catchError(() => decodePayload(data, createMockCodec()));

    expect(err.envelope.type).toBe('INVALID_DATA');
    expect(err.envelope.operation).toBe('messages.payload:decode');
    expect(err.envelope.context).toEqual({
      field: 'token',
      index: 2,
      actual: `0xff${'00'.repeat(11)}`,
    });
  });

  it('accepts zero-padded address words', () => {
    const data: `0x${string}` = `0x${'00'.repeat(12)}${'11'.repeat(20)}${'00'.repeat(32 * 4)}`;
    expect(decodePayload(data, createMockCodec()).sender).toBe(SENDER);
  });
});
