// src/core/abi.ts

export { default as AppEventABI } from './internal/abis/AppEvent';
