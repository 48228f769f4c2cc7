#!/usr/bin/env node
import { program } from 'commander';
import { buildCommand } from './commands/build.js';
import { checkCommand } from './commands/check.js';
import { newCommand } from './commands/new.js';

program
  .name('folio')
  .description('Static blog generator for Markdown posts with front matter')
  .version('0.1.0');

program
  .command('build')
  .description('Generate the site into the destination directory')
  .argument('[source]', 'Site source directory', '.')
  .option('-d, --destination <dir>', 'Output directory (overrides _config.yml)')
  .option('-c, --config <file>', 'Configuration file relative to the source')
  .option('-q, --quiet', 'Only print problems')
  .option('--verbose', 'Print every file written')
  .action(buildCommand);

program
  .command('check')
  .description('Render everything without writing and report problems')
  .argument('[source]', 'Site source directory', '.')
  .option('-c, --config <file>', 'Configuration file relative to the source')
  .action(checkCommand);

program
  .command('new')
  .description('Create a new post in the posts directory')
  .argument('<title>', 'Post title')
  .argument('[source]', 'Site source directory', '.')
  .option('--date <YYYY-MM-DD>', 'Publication date (defaults to today)')
  .option('--layout <name>', 'Layout for the post', 'post')
  .option('--keywords <list>', 'Comma-separated keywords')
  .option('-c, --config <file>', 'Configuration file relative to the source')
  .action(newCommand);

await program.parseAsync();
