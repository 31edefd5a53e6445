#!/usr/bin/env tsx
/**
 * STAC Ingestor CLI Entry Point
 *
 * @module stac-ingestor-cli
 */

import { main } from '../src/cli/index.js';

process.exitCode = await main();
