#!/usr/bin/env node
/**
 * threadscan executable
 */

import { run } from './index.js';

process.exitCode = await run(process.argv.slice(2));
