#!/usr/bin/env node
/**
 * devdrop CLI entry point
 */

import { runCli } from './program';
import { errorMessage } from '../lib/errors';

runCli(process.argv).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  },
);
