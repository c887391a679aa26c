#!/usr/bin/env node
import chalk from 'chalk';

import { main } from './index.js';

main().catch((error: unknown) => {
  process.stderr.write(`${chalk.red('Error:')} ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 2;
});
