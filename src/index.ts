#!/usr/bin/env node

/**
 * Perplexity MCP Server - Entry Point
 *
 * Serves MCP over stdio until the client disconnects or the process is
 * asked to stop, then exits with the code the run reports.
 */

import * as dotenv from 'dotenv';
import { run } from './main.js';

// Load environment variables from .env file
dotenv.config();

run().then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    console.error('💥 Fatal error in main():', error);
    process.exit(1);
  }
);
