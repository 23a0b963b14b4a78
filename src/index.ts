#!/usr/bin/env node
/**
 * Items API - Main Entry Point
 */

import { main } from './cli.js';

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
