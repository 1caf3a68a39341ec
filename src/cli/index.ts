#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createLogger } from '../logger.js';
import { registerLoad } from './commands/load.js';

const program = new Command();
program.name('streamload').description('Stream delimited text into a remote table');

registerLoad(program, {
  config: () => loadConfig(),
  logger: (config) => createLogger({ level: config.logLevel, pretty: process.stderr.isTTY }),
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
