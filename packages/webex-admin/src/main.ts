#!/usr/bin/env node
import 'dotenv/config';
import { ConfigurationError } from './api/errors';
import { askQuestion, askSecret } from './auth/prompt';
import { Command, parseCommand, runCommand, USAGE } from './cli';
import { loadConfig } from './config';
import { createLogger } from './logger';

async function main() {
  let command: Command;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    process.stderr.write(`${err.message}\n\n${USAGE}`);
    process.exit(1);
  }

  const logger = createLogger(command.verbosity);

  try {
    await runCommand(command, { config: loadConfig(), logger, ask: askQuestion, askSecret });
  } catch (err) {
    logger.error(err, 'Fatal error');
    process.exitCode = 1;
  }
}

main().catch(err => {
  process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exit(1);
});
