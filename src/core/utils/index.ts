export * from './hash';
export * from './number';
export * from './addr';

// Exhaustiveness helper for discriminated unions
export function assertNever(x: never): never {
  throw new Error('Unexpected ABI param: ' + JSON.stringify(x));
}
