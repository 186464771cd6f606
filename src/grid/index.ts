export * from './types.js';
export { decodeGrid, classifyValue, type GridLayout, type DecodeResult } from './decoder.js';
