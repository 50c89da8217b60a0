#!/usr/bin/env node
import { toError } from '@shardflow/core';
import { createProgram } from './cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${toError(error).message}`);
    process.exitCode = 1;
  });
