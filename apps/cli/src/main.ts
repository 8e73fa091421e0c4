#!/usr/bin/env node
// apps/cli/src/main.ts
//
// guess-the-number entry point. No flags: starting the program starts a game.

import 'dotenv/config';
import { run } from './cli.js';

try {
  process.exitCode = await run(process.env, { input: process.stdin, output: process.stdout });
} catch (err) {
  // the logger itself failed; stderr may be gone too
  console.error(err);
  process.exitCode = 2;
}
