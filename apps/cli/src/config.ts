// apps/cli/src/config.ts
//
// Environment handling for the CLI. Values come from process.env (after
// dotenv has merged any .env file) and are validated with the protocol's
// envSchema.

import { envSchema, type Env } from '@number-guess/protocol';
import { defaultRandom, seededRandom, type RandomSource } from '@number-guess/game-core';

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${detail}`);
  }
  return parsed.data;
}

/** Seeded play when GAME_SEED is set, Math.random otherwise. */
export function randomFromConfig(config: Env): RandomSource {
  return config.GAME_SEED ? seededRandom(config.GAME_SEED) : defaultRandom;
}
