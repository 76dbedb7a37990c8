#!/usr/bin/env tsx
import { errorMessage } from './services/errors';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`[cli] ${errorMessage(error)}`);
    process.exitCode = 1;
  });
