// packages/game-core/src/messages.ts
//
// Every line the game prints to the player.

import type { GuessResult } from '@number-guess/protocol';

export const WELCOME = 'Guess the number';
export const PROMPT = 'Please input your guess:';
export const PARSE_ERROR = 'Error: Please enter a valid number.';

export function feedbackLine(result: Exclude<GuessResult, 'correct'>): string {
  return result === 'too-small' ? 'Too small' : 'Too big';
}

export function winLine(guesses: number): string {
  return `You win, in ${guesses} guesses!`;
}
