// src/core/types/transactions.ts
import type { Address, Hex } from './primitives';

// Raw log record as handed over by the upstream log reconstruction.
export type EventLog = {
  address?: Address;
  topics: readonly Hex[];
  data: Hex;
};

// Generic transaction receipt type containing logs.
export type TxReceipt = {
  logs: readonly EventLog[];
};
