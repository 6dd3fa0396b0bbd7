import { describe, it, expect } from 'vitest';
import { APP_EVENT_PARAMS, MESSAGE_PAYLOAD_PARAMS, toToken, toTokens } from '../schema';
import { abiTypeOf } from '../types';

describe('messages/schema', () => {
  it('renders the event and payload layouts as solidity types', () => {
    expect(APP_EVENT_PARAMS.map(abiTypeOf)).toEqual(['uint256', 'bytes']);
    expect(MESSAGE_PAYLOAD_PARAMS.map(abiTypeOf)).toEqual([
      'address',
      'bytes32',
      'address',
      'uint256',
      'uint256',
    ]);
  });

  it('tags values whose JS shape matches the declared kind', () => {
    expect(toToken({ kind: 'uint', bits: 256 }, 5n)).toEqual({ kind: 'uint', value: 5n });
    expect(toToken({ kind: 'bytes' }, '0x01')).toEqual({ kind: 'bytes', value: '0x01' });
    expect(toToken({ kind: 'fixedBytes', size: 32 }, '0x02')).toEqual({
      kind: 'fixedBytes',
      value: '0x02',
    });
    expect(toToken({ kind: 'address' }, '0xabc')).toEqual({ kind: 'address', value: '0xabc' });
  });

  it('marks mismatched values as unknown', () => {
    expect(toToken({ kind: 'uint', bits: 256 }, 5)).toEqual({ kind: 'unknown', value: 5 });
    expect(toToken({ kind: 'bytes' }, 'not-hex')).toEqual({ kind: 'unknown', value: 'not-hex' });
    expect(toToken({ kind: 'address' }, 1n)).toEqual({ kind: 'unknown', value: 1n });
  });

  it('marks values beyond the declared params as unknown', () => {
    expect(toTokens(APP_EVENT_PARAMS, [1n, '0x', 'extra'])).toEqual([
      { kind: 'uint', value: 1n },
      { kind: 'bytes', value: '0x' },
      { kind: 'unknown', value: 'extra' },
    ]);
  });
});
