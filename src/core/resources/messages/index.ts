export * from './decoder';
export * from './events';
export * from './frame';
export * from './payload';
export * from './assemble';
export * from './rlp';
export * from './schema';
export * from './types';
