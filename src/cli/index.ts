#!/usr/bin/env node
import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createIngestCommand } from './commands/ingest.js';
import { createCrawlCommand } from './commands/crawl.js';
import { createBuildIndexCommand } from './commands/build-index.js';
import { createSearchCommand } from './commands/search.js';
import { createAskCommand } from './commands/ask.js';
import { createServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('ndis-rag')
  .description('Retrieval-augmented question answering over NDIS documents and web pages')
  .version('0.1.0');

program.addCommand(createInitCommand());
program.addCommand(createIngestCommand());
program.addCommand(createCrawlCommand());
program.addCommand(createBuildIndexCommand());
program.addCommand(createSearchCommand());
program.addCommand(createAskCommand());
program.addCommand(createServeCommand());

program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  console.error('❌ Command failed:', String(error));
  process.exit(1);
});
