#!/usr/bin/env node
import { createProgram } from './cli.js';
import { getLogger } from './logger.js';

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        getLogger().error('Provider failed:', error);
        process.exit(1);
    });
