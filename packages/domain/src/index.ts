export * from './types/enums.js';
export * from './types/entities.js';
export * from './types/schemas.js';
export * from './errors.js';
export * from './retry.js';
export * from './config.js';
export * from './ports/queue.port.js';
export * from './ports/storage.port.js';
export * from './ports/asr.port.js';
export * from './ports/sink.port.js';
export * from './ports/usage.port.js';
