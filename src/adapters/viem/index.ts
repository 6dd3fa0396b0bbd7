export { createViemMessageDecoder as createMessageDecoder } from './resources/messages/resource';
export * from './resources/messages/resource';
export * from './resources/messages/codec';
