export * from './enums.js';
export * from './resolution-result.js';
export * from './state-changes.js';
export * from './character-state.js';
export * from './game-session.js';
