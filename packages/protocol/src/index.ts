// Barrel export for @war/protocol
export * from './errors.js';
export * from './messages.js';
export * from './encode.js';
export * from './decode.js';
