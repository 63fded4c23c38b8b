#!/usr/bin/env node

import { Command } from 'commander';
import { createCommand } from './commands/create.js';

const program = new Command();

program
    .name('hugo-launchpad')
    .description('Scaffold a Hugo + PaperMod site that deploys to GitHub Pages')
    .version('1.0.0');

program
    .command('create', { isDefault: true })
    .description('Install Hugo and git if needed, create the site and commit it')
    .action(createCommand);

await program.parseAsync();
