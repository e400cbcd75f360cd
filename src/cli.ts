#!/usr/bin/env node
/**
 * ttyframe CLI
 *
 * Runs a command on a pseudo-terminal and streams its I/O as JSON frames.
 *
 * Usage:
 *   ttyframe --json [options] <command> [args...]
 *   ttyframe --json --token-mode compact -- npm install
 *   ttyframe --socket /tmp/frames.sock bash
 *   ttyframe --bind 127.0.0.1:7681 --record session.cast bash
 *
 * Exit codes:
 *   0  clean shutdown
 *   1  invalid configuration or unexpected failure
 *   2  the command could not be spawned
 *
 * Environment:
 *   TTYFRAME_DEBUG=1          Enable debug output on stderr
 *   TTYFRAME_LOG_LEVEL=level  debug | info | warn | error | silent
 */

import { parseArgs, runSession } from './command.js';
import { ConfigurationError, SpawnError, toError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('cli');

async function main(): Promise<number> {
  try {
    const config = parseArgs(process.argv.slice(2));
    await runSession(config);
    return 0;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.printError(err.message);
      return 1;
    }
    if (err instanceof SpawnError) {
      log.printError(err.message);
      return 2;
    }
    log.error('Fatal error', toError(err));
    return 1;
  }
}

main().then(
  code => process.exit(code),
  err => {
    log.error('Fatal error', toError(err));
    process.exit(1);
  }
);
