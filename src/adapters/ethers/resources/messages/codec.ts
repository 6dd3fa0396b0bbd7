// src/adapters/ethers/resources/messages/codec.ts
import { AbiCoder, Interface, decodeRlp } from 'ethers';
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

export type EthersAppEventCodec = AppEventCodec;

export function createEthersAppEventCodec(
  opts: { iface?: Interface; coder?: AbiCoder } = {},
): EthersAppEventCodec {
  const iface = opts.iface ?? new Interface(AppEventAbi);
  const coder = opts.coder ?? AbiCoder.defaultAbiCoder();

  const fragment = iface.getEvent('AppEvent');
  if (!fragment) {
    throw new Error('Interface does not define AppEvent.');
  }

  const decodeEvent = (log: EventLog): AbiToken[] => {
    // ethers checks topic0 against the fragment's topic hash for non-anonymous events
    const decoded = iface.decodeEventLog(fragment, log.data, log.topics);
    return toTokens(APP_EVENT_PARAMS, decoded.toArray());
  };

  const decodeParameters = (params: readonly AbiParam[], data: Hex): AbiToken[] => {
    const decoded = coder.decode(params.map(abiTypeOf), data);
    return toTokens(params, decoded.toArray());
  };

  const decodeLogRlp = (bytes: Hex | Uint8Array): EventLog => logFromRlp(decodeRlp(bytes));

  return { decodeEvent, decodeParameters, decodeLogRlp };
}
