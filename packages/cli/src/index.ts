#!/usr/bin/env tsx
/**
 * @module flaketrack-cli
 * CLI entry point for flaketrack.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
