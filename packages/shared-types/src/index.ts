export * from './line.js';
export * from './relay.js';
