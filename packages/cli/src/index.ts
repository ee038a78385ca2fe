#!/usr/bin/env node

/**
 * Parley CLI entry point
 */

import { createProgram } from './cli.js';

const program = createProgram();

program.parse(process.argv);
