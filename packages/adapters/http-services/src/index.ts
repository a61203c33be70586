export * from './asr.js';
export * from './sink.js';
export * from './usage.js';
