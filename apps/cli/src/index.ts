#!/usr/bin/env node
/**
 * Deckhand CLI entry point
 */

import { createChildLogger } from '@deckhand/shared';
import { createProgram } from './program.js';

const logger = createChildLogger({ component: 'CLI' });

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Unexpected failure');
    process.exitCode = 1;
  });
