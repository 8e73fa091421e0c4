// apps/cli/src/game.ts
//
// The interactive loop: print the welcome line, then prompt, read, evaluate
// until the player wins or input runs out.
//
// I/O is passed in (streams, random source, logger) so the loop can be
// driven in-process by tests exactly as it is by a terminal.
//
// Outcomes:
//   • won           → secret guessed; the win line has been printed
//   • input-closed  → input ended first; nothing more is printed
// An OutputError rejects the returned promise; the caller treats it as fatal.

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import {
  GuessingSession,
  PARSE_ERROR,
  PROMPT,
  WELCOME,
  feedbackLine,
  winLine,
  type RandomSource,
  type StepOutcome,
} from '@number-guess/game-core';

export class InputClosedError extends Error {
  override readonly name = 'InputClosedError';

  constructor() {
    super('Input closed before the number was guessed');
  }
}

export class OutputError extends Error {
  override readonly name = 'OutputError';

  constructor(cause: Error) {
    super(`Cannot write to output: ${cause.message}`, { cause });
  }
}

export type GameOutcome =
  | { status: 'won'; guesses: number; secret: number }
  | { status: 'input-closed'; guesses: number };

export type GameIO = {
  input: Readable;
  output: Writable;
  random: RandomSource;
  log: Logger;
};

/** Exit status for each outcome: 0 on a win, 1 when input ran out. */
export function exitCodeFor(outcome: GameOutcome): number {
  return outcome.status === 'won' ? 0 : 1;
}

/**
 * LineReader hands out one input line per call and throws InputClosedError
 * once the stream has ended.
 */
export class LineReader {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(input: Readable) {
    this.rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(): Promise<string> {
    const next = await this.lines.next();
    if (next.done) throw new InputClosedError();
    return next.value;
  }

  close(): void {
    this.rl.close();
  }
}

/** LineWriter writes whole lines and surfaces any stream failure as OutputError. */
export class LineWriter {
  private failure: Error | null = null;
  private readonly onError = (err: Error) => {
    this.failure ??= err;
  };

  constructor(private readonly output: Writable) {
    output.on('error', this.onError);
  }

  writeLine(line: string): Promise<void> {
    if (this.failure) return Promise.reject(new OutputError(this.failure));
    return new Promise((resolve, reject) => {
      this.output.write(`${line}\n`, (err) => {
        if (err) reject(new OutputError(err));
        else resolve();
      });
    });
  }

  release(): void {
    this.output.off('error', this.onError);
  }
}

function describeStep(step: StepOutcome): string {
  if (step.kind === 'invalid') return PARSE_ERROR;
  return step.result === 'correct' ? winLine(step.guesses) : feedbackLine(step.result);
}

export async function runGame({ input, output, random, log }: GameIO): Promise<GameOutcome> {
  const reader = new LineReader(input);
  const writer = new LineWriter(output);
  const session = new GuessingSession(random);
  log.info('session started');
  log.debug({ secret: session.secret }, 'secret drawn');

  try {
    await writer.writeLine(WELCOME);

    while (!session.won) {
      await writer.writeLine(PROMPT);
      session.markPrompted();

      let line: string;
      try {
        line = await reader.readLine();
      } catch (err) {
        if (err instanceof InputClosedError) {
          log.warn({ guesses: session.guesses }, err.message);
          return { status: 'input-closed', guesses: session.guesses };
        }
        throw err;
      }

      const step = session.submit(line);
      if (step.kind === 'invalid') {
        log.debug({ input: step.error.input }, step.error.message);
      } else {
        log.debug({ guess: step.guess, result: step.result, guesses: step.guesses }, 'guess evaluated');
      }
      await writer.writeLine(describeStep(step));
    }

    log.info({ guesses: session.guesses }, 'session won');
    return { status: 'won', guesses: session.guesses, secret: session.secret };
  } finally {
    reader.close();
    writer.release();
  }
}
