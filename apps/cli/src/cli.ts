// apps/cli/src/cli.ts
//
// One CLI run from environment to exit status. main.ts binds it to the real
// process; tests call it with in-process streams.
//
// Exit codes:
//   0 → the number was guessed
//   1 → input closed before a win
//   2 → invalid environment or the output stream failed

import type { Readable, Writable } from 'node:stream';
import type pino from 'pino';
import type { Env } from '@number-guess/protocol';
import { ConfigError, loadConfig, randomFromConfig } from './config.js';
import { exitCodeFor, runGame } from './game.js';
import { createLogger } from './logger.js';

export type CliIO = {
  input: Readable;
  output: Writable;
  /** Where log lines go; stderr when omitted. */
  logDestination?: pino.DestinationStream;
};

export async function run(env: NodeJS.ProcessEnv, io: CliIO): Promise<number> {
  let config: Env;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger('error', io.logDestination).error(err.message);
      return 2;
    }
    throw err;
  }

  const log = createLogger(config.LOG_LEVEL, io.logDestination);
  try {
    const outcome = await runGame({
      input: io.input,
      output: io.output,
      random: randomFromConfig(config),
      log,
    });
    return exitCodeFor(outcome);
  } catch (err) {
    log.fatal({ err }, 'game aborted');
    return 2;
  }
}
