import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage, openWorkspace, pickConversation } from '../context.js';

export const resetCommand = new Command('reset')
  .description('Put a conversation back on the baseline temperatures')
  .option('-c, --conversation <id>', 'Conversation id (default: most recent)')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action((opts: { conversation?: string; root?: string }) => {
    try {
      const ws = openWorkspace(opts);
      const conversation = pickConversation(ws, opts.conversation);
      ws.settings.resetTemperatures(conversation.id);
      ws.activity.append('temperatures_reset', `Temperatures reset for ${conversation.id}`);
      console.log(chalk.green('Reset to baseline:'), conversation.id);
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
