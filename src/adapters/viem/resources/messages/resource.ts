// src/adapters/viem/resources/messages/resource.ts
import {
  createMessageDecoder,
  type MessageDecoder,
} from '../../../../core/resources/messages/decoder';
import type { DecoderOptions } from '../../../../core/types/flows/messages';
import { createViemAppEventCodec } from './codec';

export type ViemMessageDecoderOptions = DecoderOptions;

export function createViemMessageDecoder(opts: ViemMessageDecoderOptions = {}): MessageDecoder {
  return createMessageDecoder(createViemAppEventCodec(), opts);
}
