import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage, openWorkspace } from '../context.js';

export const deleteCommand = new Command('delete')
  .description('Delete a conversation with its messages, analyses and settings')
  .argument('<id>', 'Conversation id')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action((id: string, opts: { root?: string }) => {
    try {
      const ws = openWorkspace(opts);
      if (!ws.conversations.delete(id)) throw new Error(`Conversation ${id} not found`);
      ws.settings.remove(id);
      ws.activity.append('conversation_deleted', `Conversation deleted`, id);
      console.log(chalk.green('Deleted:'), id);
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
