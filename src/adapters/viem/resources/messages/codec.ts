// src/adapters/viem/resources/messages/codec.ts
import { decodeAbiParameters, decodeEventLog, fromRlp } from 'viem';
import AppEventAbi from '../../../../core/internal/abis/AppEvent';
import type { EventLog } from '../../../../core/types/transactions';
import type { Hex } from '../../../../core/types/primitives';
import { logFromRlp } from '../../../../core/resources/messages/rlp';
import { APP_EVENT_PARAMS, toTokens } from '../../../../core/resources/messages/schema';
import {
  abiTypeOf,
  type AbiParam,
  type AbiToken,
  type AppEventCodec,
} from '../../../../core/resources/messages/types';

export type ViemAppEventCodec = AppEventCodec;

export function createViemAppEventCodec(): ViemAppEventCodec {
  const decodeEvent = (log: EventLog): AbiToken[] => {
    const [signature, ...rest] = log.topics;
    if (!signature) {
      throw new Error('AppEvent log has no signature topic.');
    }
    const { args } = decodeEventLog({
      abi: AppEventAbi,
      eventName: 'AppEvent',
      data: log.data,
      topics: [signature, ...rest],
      strict: true,
    });
    return toTokens(APP_EVENT_PARAMS, [args._tag, args._data]);
  };

  const decodeParameters = (params: readonly AbiParam[], data: Hex): AbiToken[] => {
    const values = decodeAbiParameters(
      params.map((param) => ({ type: abiTypeOf(param) })),
      data,
    );
    return toTokens(params, values);
  };

  const decodeLogRlp = (bytes: Hex | Uint8Array): EventLog => logFromRlp(fromRlp(bytes, 'hex'));

  return { decodeEvent, decodeParameters, decodeLogRlp };
}
