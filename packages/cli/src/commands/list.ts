import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage, openWorkspace } from '../context.js';

export const listCommand = new Command('list')
  .description('List conversations, most recent first')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action((opts: { root?: string }) => {
    try {
      const conversations = openWorkspace(opts).conversations.list();
      if (conversations.length === 0) {
        console.log(chalk.gray('  (no conversations)'));
        return;
      }
      for (const c of conversations) {
        console.log(
          `  ${chalk.bold(c.id)}  ${c.title}  ` +
          chalk.gray(`${c.messages.length} msgs | ${c.analyses.length} analyses | ${c.updatedAt}`),
        );
      }
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
