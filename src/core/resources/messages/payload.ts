// src/core/resources/messages/payload.ts
import { NONCE_BITS, RECIPIENT_BYTES } from '../../constants';
import { createError } from '../../errors/factory';
import { createErrorHandlers } from '../../errors/error-ops';
import { OP_MESSAGES } from '../../types/errors';
import type { MessagePayload, NarrowingMode } from '../../types/flows/messages';
import type { Address, Bytes32, Hex } from '../../types/primitives';
import { isAddress } from '../../utils/addr';
import { hexByteLength, isHash66 } from '../../utils/hash';
import { fitsBits, lowBits } from '../../utils/number';
import { MESSAGE_PAYLOAD_PARAMS } from './schema';
import type { AbiToken, AppEventCodec } from './types';

type PayloadField = 'sender' | 'recipient' | 'token' | 'amount' | 'nonce';

const FIELDS = [
  'sender',
  'recipient',
  'token',
  'amount',
  'nonce',
] as const satisfies readonly PayloadField[];

// Head word of an address holds 12 zero bytes, then the 20 address bytes.
const WORD_HEX = 64;
const ADDRESS_PADDING_HEX = 24;

const { wrapAs } = createErrorHandlers('payload');

function kindMismatch(
  field: PayloadField,
  index: number,
  expected: AbiToken['kind'],
  token: AbiToken | undefined,
) {
  return createError('INVALID_PAYLOAD', {
    resource: 'payload',
    operation: OP_MESSAGES.payload.field,
    message: token
      ? `Payload field '${field}' has kind '${token.kind}', expected '${expected}'.`
      : `Payload field '${field}' is missing.`,
    context: { field, index, expected, actual: token?.kind ?? 'missing' },
  });
}

// Some codecs keep the low 20 bytes of an address word and drop the rest.
function assertAddressPadding(data: Hex): void {
  MESSAGE_PAYLOAD_PARAMS.forEach((param, index) => {
    if (param.kind !== 'address') return;
    const start = 2 + index * WORD_HEX;
    const padding = data.slice(start, start + ADDRESS_PADDING_HEX);
    if (padding.length < ADDRESS_PADDING_HEX || /^0+$/.test(padding)) return;
    throw createError('INVALID_DATA', {
      resource: 'payload',
      operation: OP_MESSAGES.payload.decode,
      message: `Payload field '${FIELDS[index]}' has non-zero bytes above its 20-byte address.`,
      context: { field: FIELDS[index], index, actual: `0x${padding}` },
    });
  });
}

function readAddress(tokens: AbiToken[], index: number, field: PayloadField): Address {
  const token = tokens[index];
  if (!token || token.kind !== 'address') throw kindMismatch(field, index, 'address', token);
  if (!isAddress(token.value)) {
    throw createError('INVALID_ADDRESS', {
      resource: 'payload',
      operation: OP_MESSAGES.payload.field,
      message: `Payload field '${field}' is not a 20-byte address.`,
      context: { field, index, actual: token.value },
    });
  }
  return token.value;
}

function readBytes32(tokens: AbiToken[], index: number, field: PayloadField): Bytes32 {
  const token = tokens[index];
  if (!token || token.kind !== 'fixedBytes') throw kindMismatch(field, index, 'fixedBytes', token);
  // The grammar hands back a variable-length buffer; pin it to the declared width.
  if (!isHash66(token.value)) {
    throw createError('INVALID_PAYLOAD', {
      resource: 'payload',
      operation: OP_MESSAGES.payload.field,
      message: `Payload field '${field}' must be exactly ${RECIPIENT_BYTES} bytes.`,
      context: { field, index, expected: RECIPIENT_BYTES, actual: hexByteLength(token.value) },
    });
  }
  return token.value;
}

function readUint(tokens: AbiToken[], index: number, field: PayloadField): bigint {
  const token = tokens[index];
  if (!token || token.kind !== 'uint') throw kindMismatch(field, index, 'uint', token);
  return token.value;
}

/**
 * Decodes the opaque AppEvent payload into its five fields.
 * Fields are read strictly in order and the first failing check aborts the decode.
 * No semantic checks are made (a zero sender is accepted).
 */
export function decodePayload(
  data: Hex,
  codec: AppEventCodec,
  narrowing: NarrowingMode = 'truncate',
): MessagePayload {
  const tokens = wrapAs(
    'INVALID_DATA',
    OP_MESSAGES.payload.decode,
    () => codec.decodeParameters(MESSAGE_PAYLOAD_PARAMS, data),
    { message: 'Payload does not match the (address,bytes32,address,uint256,uint256) ABI.' },
  );
  assertAddressPadding(data);

  const sender = readAddress(tokens, 0, 'sender');
  const recipient = readBytes32(tokens, 1, 'recipient');
  const token = readAddress(tokens, 2, 'token');
  const amount = readUint(tokens, 3, 'amount');
  const rawNonce = readUint(tokens, 4, 'nonce');

  if (narrowing === 'strict' && !fitsBits(rawNonce, NONCE_BITS)) {
    throw createError('INVALID_PAYLOAD', {
      resource: 'payload',
      operation: OP_MESSAGES.payload.nonce,
      message: `Nonce does not fit in ${NONCE_BITS} bits.`,
      context: { field: 'nonce', index: 4, nonce: rawNonce },
    });
  }

  return {
    sender,
    recipient,
    token,
    amount,
    nonce: lowBits(rawNonce, NONCE_BITS),
  };
}
