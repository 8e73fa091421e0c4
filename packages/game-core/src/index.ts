// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • random.ts   → random sources and the secret draw
//   • guess.ts    → parseGuess, compareGuess, GuessParseError
//   • session.ts  → GuessingSession state machine
//   • messages.ts → the lines printed to the player
//
// Example usage:
//   import { GuessingSession, seededRandom } from '@number-guess/game-core';

export * from './random.js';
export * from './guess.js';
export * from './session.js';
export * from './messages.js';
