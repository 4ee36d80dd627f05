#!/usr/bin/env node

/**
 * ffi-headergen CLI entry point.
 *
 * This is the main entry point for the 'ffi-headergen' CLI command.
 */

import { runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

void withErrorHandling(() => runCli(process.argv.slice(2)));
