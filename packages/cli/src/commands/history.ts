import { Command } from 'commander';
import chalk from 'chalk';
import { AGENT_ROLES } from '@mindloop/core';
import { errorMessage, openWorkspace, pickConversation } from '../context.js';

export const historyCommand = new Command('history')
  .description('Show recent analysis records')
  .option('-c, --conversation <id>', 'Conversation id (default: most recent)')
  .option('-l, --limit <n>', 'How many records', '5')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action((opts: { conversation?: string; limit: string; root?: string }) => {
    try {
      const limit = Number.parseInt(opts.limit, 10);
      if (!Number.isInteger(limit) || limit <= 0) throw new Error(`Invalid limit: ${opts.limit}`);

      const ws = openWorkspace(opts);
      const conversation = pickConversation(ws, opts.conversation);
      const analyses = ws.conversations.listAnalyses(conversation.id).slice(-limit).reverse();

      if (analyses.length === 0) {
        console.log(chalk.gray('  (no analyses yet)'));
        return;
      }

      for (const a of analyses) {
        console.log(chalk.bold.white(`\n  ${a.createdAt}`) + chalk.gray(`  ${a.id}`));
        console.log(`  ${chalk.cyan('>')} ${a.userInput.slice(0, 100)}`);
        const state = a.emotionalState.map((m) => `${m.percentage}% ${m.label}`).join(', ');
        console.log(chalk.white('  State: ') + (state || chalk.gray('(none parsed)')));
        const next = AGENT_ROLES.map((role) => `${role} ${a.nextTemperatures[role].toFixed(2)}`).join('  ');
        console.log(chalk.gray(`  Next:  ${next}`));
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
