#!/usr/bin/env node

/**
 * dataset-sync CLI
 *
 * Commands:
 * - sync: Upload new images to the dataset hub, mirror project files to git
 * - status: Show what a sync would upload
 * - scan: List local images and project files
 * - config: Show or create the project configuration
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  const parsed = parse(readFileSync(filePath, 'utf-8'));
  for (const [key, value] of Object.entries(parsed)) {
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { registerSyncCommand } from './cli/commands/sync.js';
import { registerStatusCommand } from './cli/commands/status.js';
import { registerScanCommand } from './cli/commands/scan.js';
import { registerConfigCommands } from './cli/commands/config.js';

const program = new Command();

program
  .name('dataset-sync')
  .description('Incremental image dataset upload with a git mirror for project files')
  .version('0.1.0');

registerSyncCommand(program);
registerStatusCommand(program);
registerScanCommand(program);
registerConfigCommands(program);

await program.parseAsync();
