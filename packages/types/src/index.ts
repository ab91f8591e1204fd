export * from './cards.js';
export * from './game.js';
// NOTE: wire message types live in @war/protocol
