#!/usr/bin/env node
import dotenv from 'dotenv';
import { Command } from 'commander';
import { loadClientConfig } from './client/config.js';
import { createNotesApi } from './client/index.js';
import {
  type CliContext,
  addCommand,
  editCommand,
  listCommand,
  loginCommand,
  logoutCommand,
  registerCommand,
  removeCommand,
  runCommand,
} from './cli/commands.js';

async function main(): Promise<void> {
  dotenv.config();

  const config = loadClientConfig();
  const api = createNotesApi({ baseUrl: config.baseUrl, tokenFile: config.tokenFile });
  const ctx: CliContext = {
    auth: api.auth,
    notes: api.notes,
    output: {
      log: (line) => console.log(line),
      error: (line) => console.error(line),
    },
  };

  async function run(action: () => Promise<void>): Promise<void> {
    process.exitCode = await runCommand(ctx, action);
  }

  const program = new Command();

  program
    .name('notes-vault')
    .description('Keep notes on a Notes Vault server')
    .version('1.0.0');

  program
    .command('register')
    .description('Create an account')
    .argument('<email>')
    .requiredOption('-p, --password <password>', 'account password')
    .action(async (email: string, options: { password: string }) => {
      await run(() => registerCommand(ctx, email, options.password));
    });

  program
    .command('login')
    .description('Log in and remember the session')
    .argument('<email>')
    .requiredOption('-p, --password <password>', 'account password')
    .action(async (email: string, options: { password: string }) => {
      await run(() => loginCommand(ctx, email, options.password));
    });

  program
    .command('logout')
    .description('Forget the stored session')
    .action(async () => {
      await run(() => logoutCommand(ctx));
    });

  program
    .command('list')
    .description('Show your notes, newest first')
    .action(async () => {
      await run(() => listCommand(ctx));
    });

  program
    .command('add')
    .description('Create a note')
    .argument('<title>')
    .argument('<content>')
    .action(async (title: string, content: string) => {
      await run(() => addCommand(ctx, title, content));
    });

  program
    .command('edit')
    .description('Replace the title and content of a note')
    .argument('<id>')
    .argument('<title>')
    .argument('<content>')
    .action(async (id: string, title: string, content: string) => {
      await run(() => editCommand(ctx, id, title, content));
    });

  program
    .command('rm')
    .description('Delete a note')
    .argument('<id>')
    .action(async (id: string) => {
      await run(() => removeCommand(ctx, id));
    });

  await program.parseAsync(process.argv);
}

try {
  await main();
} catch (error) {
  console.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
