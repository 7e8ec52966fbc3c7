export { characters } from './characters.js';
export { scenarios } from './scenarios.js';
export { gameSessions } from './game-sessions.js';
