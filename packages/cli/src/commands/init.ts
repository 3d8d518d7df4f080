import { Command } from 'commander';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import chalk from 'chalk';
import { MIND_DIR } from '@mindloop/core';
import { errorMessage, openWorkspace } from '../context.js';

export const initCommand = new Command('init')
  .description('Create the data directory and a first conversation')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .option('-t, --title <title>', 'Title of the first conversation', 'New Chat')
  .action((opts: { root?: string; title: string }) => {
    try {
      const ws = openWorkspace(opts);
      const dir = join(ws.root, MIND_DIR);
      if (existsSync(dir) && ws.conversations.list().length > 0) {
        console.log(chalk.yellow('Already initialized:'), dir);
        return;
      }
      mkdirSync(dir, { recursive: true });
      const conversation = ws.conversations.create(opts.title);
      ws.activity.append('conversation_created', `Conversation: ${conversation.title}`, conversation.id);

      console.log(chalk.green('Initialized:'), chalk.bold(dir));
      console.log(chalk.gray(`  Conversation: ${conversation.id}`));
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
