#!/usr/bin/env node

// Load environment variables from .env file
import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { initCommand } from './commands/init.js';
import { postCommand } from './commands/post.js';
import { scheduleCommand } from './commands/schedule.js';
import { historyCommand } from './commands/history.js';
import { parseVisibility, positiveInt } from './commands/options.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
);

const program = new Command();

program
  .name('seopost')
  .description('Generate SEO-tuned LinkedIn posts with an LLM and publish them on a schedule')
  .version(packageJson.version);

program
  .command('init')
  .description('Create .seopostrc.json and a .env template in the current directory')
  .action(initCommand);

program
  .command('post')
  .description('Generate, validate and publish one post now')
  .option('-a, --max-attempts <n>', 'Generation attempts before giving up', positiveInt)
  .option('--visibility <visibility>', 'PUBLIC or CONNECTIONS', parseVisibility)
  .option('-d, --debug', 'Log request and response bodies')
  .action(postCommand);

program
  .command('schedule')
  .description('Publish a post on a cron schedule and serve a health check')
  .option('--cron <expression>', 'Override the cron expression from config')
  .option('-p, --port <port>', 'Health check port', positiveInt)
  .option('-d, --debug', 'Log request and response bodies')
  .action(scheduleCommand);

program
  .command('history')
  .description('Show recent post records with their SEO metrics')
  .option('-n, --count <number>', 'Number of records to show (default: 10)', positiveInt)
  .option('--failed', 'Only show failed runs')
  .action(historyCommand);

program.parse();
