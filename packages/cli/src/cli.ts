#!/usr/bin/env node
import { errorMessage } from '@stepdeck/engine/util';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
