// src/core/resources/messages/decoder.ts
import { createErrorHandlers } from '../../errors/error-ops';
import { OP_MESSAGES, type TryResult } from '../../types/errors';
import type { DecoderOptions, Message } from '../../types/flows/messages';
import type { Hex } from '../../types/primitives';
import type { EventLog, TxReceipt } from '../../types/transactions';
import { assembleMessage } from './assemble';
import { findAppEventLogs, type FindAppEventOptions } from './events';
import { decodeFrame } from './frame';
import { decodePayload } from './payload';
import type { AppEventCodec } from './types';

export interface MessageDecoder {
  /** Decodes one AppEvent log. Throws BridgeError on any failure. */
  decode(log: EventLog): Message;
  tryDecode(log: EventLog): TryResult<Message>;
  /** Rebuilds a log from RLP, then decodes it. */
  decodeRlp(bytes: Hex | Uint8Array): Message;
  tryDecodeRlp(bytes: Hex | Uint8Array): TryResult<Message>;
  decodeLogRlp(bytes: Hex | Uint8Array): EventLog;
  /** Decodes every AppEvent log of a receipt, in log order. */
  decodeReceipt(receipt: TxReceipt, opts?: FindAppEventOptions): Message[];
}

const { wrapAs, toResult } = createErrorHandlers('messages');
const rlp = createErrorHandlers('rlp');

// Start → FrameDecoded → PayloadDecoded → Assembled; any stage may end in a BridgeError.
export function createMessageDecoder(
  codec: AppEventCodec,
  opts: DecoderOptions = {},
): MessageDecoder {
  const narrowing = opts.narrowing ?? 'truncate';

  const run = (log: EventLog): Message => {
    const frame = decodeFrame(log, codec, narrowing);
    const payload = decodePayload(frame.payload, codec, narrowing);
    return assembleMessage(frame.tag, payload);
  };

  const decode = (log: EventLog): Message =>
    wrapAs('INVALID_PAYLOAD', OP_MESSAGES.decode, () => run(log), {
      message: 'Malformed AppEvent log.',
    });

  const decodeLogRlp = (bytes: Hex | Uint8Array): EventLog =>
    rlp.wrapAs('INVALID_RLP', OP_MESSAGES.rlp.decode, () => codec.decodeLogRlp(bytes), {
      message: 'Log is not a valid RLP-encoded [address, topics, data] list.',
    });

  const decodeRlp = (bytes: Hex | Uint8Array): Message => decode(decodeLogRlp(bytes));

  return {
    decode,
    tryDecode: (log) => toResult(OP_MESSAGES.tryDecode, () => decode(log)),
    decodeRlp,
    tryDecodeRlp: (bytes) => toResult(OP_MESSAGES.tryDecodeRlp, () => decodeRlp(bytes)),
    decodeLogRlp,
    decodeReceipt: (receipt, findOpts) => {
      const logs = wrapAs(
        'INVALID_DATA',
        OP_MESSAGES.decodeReceipt,
        () => findAppEventLogs(receipt, findOpts),
        { message: 'Receipt does not carry a list of logs.' },
      );
      return logs.map(decode);
    },
  };
}
