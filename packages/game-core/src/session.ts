// packages/game-core/src/session.ts
//
// One game session: a secret drawn once, a guess counter, and the state
// machine the CLI loop drives.
//
//   prompting → awaiting-input → evaluating → prompting   (miss or bad input)
//                                           → won         (terminal)
//
// The session does no I/O. The loop calls markPrompted() after printing the
// prompt and submit() with each line it reads.

import type { GuessResult } from '@number-guess/protocol';
import { compareGuess, parseGuess, type GuessParseError } from './guess.js';
import { defaultRandom, drawSecret, type RandomSource } from './random.js';

export const SECRET_MIN = 1;
export const SECRET_MAX = 100;

export type SessionState = 'prompting' | 'awaiting-input' | 'evaluating' | 'won';

export type StepOutcome =
  | { kind: 'invalid'; error: GuessParseError; guesses: number }
  | { kind: 'feedback'; guess: number; result: GuessResult; guesses: number };

export class SessionFinishedError extends Error {
  override readonly name = 'SessionFinishedError';

  constructor(guesses: number) {
    super(`Session already won in ${guesses} guesses`);
  }
}

export class GuessingSession {
  readonly secret: number;
  private count = 0;
  private current: SessionState = 'prompting';

  constructor(random: RandomSource = defaultRandom) {
    this.secret = drawSecret(random, SECRET_MIN, SECRET_MAX);
  }

  /** Number of valid guesses so far, the winning one included. */
  get guesses(): number {
    return this.count;
  }

  get state(): SessionState {
    return this.current;
  }

  get won(): boolean {
    return this.current === 'won';
  }

  markPrompted(): void {
    this.assertPlaying();
    this.current = 'awaiting-input';
  }

  /**
   * submit evaluates one line of input.
   *
   * Unparsable lines leave the counter untouched. Each parsed guess counts
   * once; a correct guess ends the session.
   */
  submit(line: string): StepOutcome {
    this.assertPlaying();
    this.current = 'evaluating';

    const parsed = parseGuess(line);
    if (!parsed.ok) {
      this.current = 'prompting';
      return { kind: 'invalid', error: parsed.error, guesses: this.count };
    }

    this.count += 1;
    const result = compareGuess(parsed.value, this.secret);
    this.current = result === 'correct' ? 'won' : 'prompting';
    return { kind: 'feedback', guess: parsed.value, result, guesses: this.count };
  }

  private assertPlaying(): void {
    if (this.current === 'won') throw new SessionFinishedError(this.count);
  }
}
