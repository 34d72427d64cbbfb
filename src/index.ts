#!/usr/bin/env node
import { reportFatalError, runCli } from './cli.js';

runCli(process.argv).then(exitCode => {
  if (exitCode !== null) {
    process.exit(exitCode);
  }
}).catch((error: unknown) => {
  reportFatalError(error);
  process.exit(1);
});
