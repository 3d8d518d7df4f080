import { Command } from 'commander';
import chalk from 'chalk';
import { AGENT_ROLES, ROLE_INFO, temperatureBand, temperatureEffectiveness } from '@mindloop/core';
import { errorMessage, openWorkspace, pickConversation } from '../context.js';

const RATING_COLOR = {
  'Optimal': chalk.green,
  'Near-Optimal': chalk.cyan,
  'Less-Optimal': chalk.yellow,
  'Sub-Optimal': chalk.red,
} as const;

export const tempsCommand = new Command('temps')
  .description('Show the current temperatures with effectiveness ratings')
  .option('-c, --conversation <id>', 'Conversation id (default: most recent)')
  .option('-r, --root <path>', 'Data root (default: MINDLOOP_ROOT or current directory)')
  .action((opts: { conversation?: string; root?: string }) => {
    try {
      const ws = openWorkspace(opts);
      const conversation = pickConversation(ws, opts.conversation);
      const temps = ws.settings.loadCurrentTemperatures(conversation.id);

      console.log(chalk.bold.white(`\n  ${conversation.title}`) + chalk.gray(`  ${conversation.id}`));
      console.log();
      for (const role of AGENT_ROLES) {
        const info = ROLE_INFO[role];
        const t = temps[role];
        const { percentage, rating } = temperatureEffectiveness(role, t);
        console.log(
          `  ${info.icon} ${info.label.padEnd(11)} ${t.toFixed(2)}  ${chalk.gray(temperatureBand(t).padEnd(9))}  ` +
          RATING_COLOR[rating](`${percentage.toFixed(1)}% ${rating}`),
        );
      }
      console.log();
    } catch (err) {
      console.error(chalk.red('Error:'), errorMessage(err));
      process.exit(1);
    }
  });
