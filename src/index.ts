#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';
import { errorMessage } from './core/errors.js';

const program = buildCli();
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`riskdrift: ${errorMessage(err)}`);
  process.exit(1);
});
