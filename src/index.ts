#!/usr/bin/env node
/**
 * creative-report - Generate a yearly Creative Work Report from GitHub and Jira
 *
 * Entry point for the CLI application
 */

import dotenv from 'dotenv';
import { createProgram } from './cli';

dotenv.config();

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
