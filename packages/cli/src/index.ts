#!/usr/bin/env node
import { API_SERVER_VERSION } from '@blog-api/api-server';
import { createProgram } from './program.js';

createProgram(API_SERVER_VERSION)
  .parseAsync()
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    // eslint-disable-next-line no-console
    console.error('[blog-api]', message);
    process.exit(1);
  });
