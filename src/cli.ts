#!/usr/bin/env node
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: Error) => {
    process.stderr.write(`✗ ${err.message}\n`);
    process.exitCode = 1;
  });
