#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { chatCommand } from './commands/chat.js';
import { tempsCommand } from './commands/temps.js';
import { resetCommand } from './commands/reset.js';
import { historyCommand } from './commands/history.js';
import { listCommand } from './commands/list.js';
import { deleteCommand } from './commands/delete.js';
import { blendCommand } from './commands/blend.js';
import { setCommand } from './commands/set.js';

const program = new Command();

program
  .name('mindloop')
  .description('Seven-agent conversation loop whose temperatures follow its own emotional state')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(chatCommand);
program.addCommand(tempsCommand);
program.addCommand(resetCommand);
program.addCommand(historyCommand);
program.addCommand(listCommand);
program.addCommand(deleteCommand);
program.addCommand(blendCommand);
program.addCommand(setCommand);

await program.parseAsync();
