#!/usr/bin/env node

/**
 * kvconf CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';

import { createProgram } from './index.js';

createProgram().parse();
