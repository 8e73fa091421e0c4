// packages/protocol/src/index.ts
//
// Shared text-protocol definitions for the number guessing game.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - GuessResult: outcome of comparing a guess ("too-small", "too-big", "correct").
//   - guessLine:   one line of player input, parsed into an integer.
//   - envSchema:   process environment accepted by the CLI.

import { z } from 'zod';

/**
 * GuessResult schema:
 *  - "too-small" → guess is below the secret
 *  - "too-big"   → guess is above the secret
 *  - "correct"   → guess equals the secret
 */
export const guessResultSchema = z.enum(['too-small', 'too-big', 'correct']);
export type GuessResult = z.infer<typeof guessResultSchema>;

/* -------------------------------------------------------------------------- */
/*                                 Guess line                                 */
/* -------------------------------------------------------------------------- */

/**
 * One line of player input.
 *  - surrounding whitespace (and the trailing newline) is ignored
 *  - base-10 digits with an optional leading sign
 *  - must fit in a safe integer; range is otherwise unrestricted
 */
export const guessLine = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'not a base-10 integer')
  .transform((s) => Number(s))
  .pipe(z.number().refine((n) => Number.isSafeInteger(n), 'integer out of range'));

/* -------------------------------------------------------------------------- */
/*                                Environment                                 */
/* -------------------------------------------------------------------------- */

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Environment read by the CLI:
 *  - LOG_LEVEL: pino level, defaults to "warn" (logs go to stderr)
 *  - GAME_SEED: optional string for a deterministic secret
 */
export const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('warn'),
  GAME_SEED: z.string().min(1).optional(),
});
export type Env = z.infer<typeof envSchema>;
