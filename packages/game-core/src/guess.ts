// packages/game-core/src/guess.ts
//
// Parsing and comparison of a single guess.
//
// Rules:
//   • A guess line is trimmed, then must be a base-10 integer (optional sign).
//   • Any safe integer is accepted, including values outside the secret range;
//     comparison works the same for them.
//   • Parsing never throws; failures come back as a GuessParseError value.

import { guessLine, type GuessResult } from '@number-guess/protocol';

export type { GuessResult };

export class GuessParseError extends Error {
  override readonly name = 'GuessParseError';

  constructor(
    readonly input: string,
    reason: string,
  ) {
    super(`Cannot parse guess ${JSON.stringify(input)}: ${reason}`);
  }
}

export type ParsedGuess =
  | { ok: true; value: number }
  | { ok: false; error: GuessParseError };

/**
 * parseGuess turns one line of input into an integer guess.
 *
 * Example:
 *   parseGuess(" 42\n") → { ok: true, value: 42 }
 *   parseGuess("abc")   → { ok: false, error: GuessParseError }
 */
export function parseGuess(line: string): ParsedGuess {
  const parsed = guessLine.safeParse(line);
  if (parsed.success) return { ok: true, value: parsed.data };
  const reason = parsed.error.issues.map((i) => i.message).join('; ');
  return { ok: false, error: new GuessParseError(line, reason) };
}

/** compareGuess orders a guess against the secret. */
export function compareGuess(guess: number, secret: number): GuessResult {
  if (guess < secret) return 'too-small';
  if (guess > secret) return 'too-big';
  return 'correct';
}
