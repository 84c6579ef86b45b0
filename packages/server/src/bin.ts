#!/usr/bin/env node
/**
 * @fileoverview chess-uci-mcp executable
 */
import { main } from './cli.js';

main().catch((error: unknown) => {
  console.error('Failed to start chess-uci-mcp:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
