#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { initCommand } from '@/commands/init';
import { lsCommand } from '@/commands/ls';

const program = new Command();

program
  .name('sitemap-tree')
  .version(__PACKAGE_VERSION__)
  .description("Discover and list a website's sitemap tree");

program.addCommand(lsCommand);
program.addCommand(initCommand);

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  process.exit(1);
});

process.on('SIGINT', () => {
  process.exit(130);
});

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
