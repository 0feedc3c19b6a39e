#!/usr/bin/env node
import { createCLI } from './adapters/cli/index.js';

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  });
