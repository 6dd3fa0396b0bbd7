// src/adapters/ethers/resources/messages/resource.ts
import type { AbiCoder, Interface } from 'ethers';
import {
  createMessageDecoder,
  type MessageDecoder,
} from '../../../../core/resources/messages/decoder';
import type { DecoderOptions } from '../../../../core/types/flows/messages';
import { createEthersAppEventCodec } from './codec';

export type EthersMessageDecoderOptions = DecoderOptions & {
  iface?: Interface;
  coder?: AbiCoder;
};

export function createEthersMessageDecoder(opts: EthersMessageDecoderOptions = {}): MessageDecoder {
  const { iface, coder, ...decoderOpts } = opts;
  return createMessageDecoder(createEthersAppEventCodec({ iface, coder }), decoderOpts);
}
