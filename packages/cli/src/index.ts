#!/usr/bin/env tsx
/**
 * @module autodiag-cli
 * CLI entry point for autodiag.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
